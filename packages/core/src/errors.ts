/**
 * ptp4l設定処理のエラー
 */

export type Ptp4lConfErrorCode =
  | 'MALFORMED_SECTION'
  | 'OPTION_OUTSIDE_SECTION'
  | 'STRUCTURAL_MISMATCH';

export class Ptp4lConfError extends Error {
  constructor(
    message: string,
    public readonly code: Ptp4lConfErrorCode,
    public readonly line?: string
  ) {
    super(message);
    this.name = 'Ptp4lConfError';
  }
}
