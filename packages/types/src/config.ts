/**
 * ptpconf 設定ファイルの型定義
 */

export interface PtpConfConfig {
  version: string;
  daemon: DaemonConfig;
  synce: SynceConfig;
  output: OutputConfig;
}

export interface DaemonConfig {
  /** デフォルトのptp4l設定ファイル */
  ptp4lConfPath: string;
}

export interface SynceConfig {
  /** クロックID割り当てに使う設定（例: "clockId[eth0]": "0x..."） */
  settings: Record<string, string>;
}

export interface OutputConfig {
  /** CLIの出力形式 */
  format: 'text' | 'json';
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: PtpConfConfig = {
  version: '1.0',
  daemon: {
    ptp4lConfPath: '/etc/ptp4l.conf',
  },
  synce: {
    settings: {},
  },
  output: {
    format: 'text',
  },
};
