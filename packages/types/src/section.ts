/**
 * ptp4l設定ファイルのセクション・文書の型定義
 */

/**
 * セクションの種類
 * - plain: `[eth0]` などの通常セクション
 * - device: `[<synce1>]` SyncEデバイスの区切り
 * - externalSource: `[{gnss}]` 外部ソースの指定
 */
export type SectionKind = 'plain' | 'device' | 'externalSource';

export interface Ptp4lSection {
  /** セクションの種類（パース時に確定） */
  kind: SectionKind;
  /** 区切り文字を除いた名前（例: eth0, synce1） */
  name: string;
  /** 記述どおりのヘッダ（例: [<synce1>]） */
  header: string;
  /** オプション（挿入順を保持） */
  options: ReadonlyMap<string, string>;
}

/**
 * ノードのPTPトポロジ上の役割
 */
export type ClockRole = 'GrandMaster' | 'BoundaryClock' | 'OrdinaryClock';

export interface Ptp4lDocument {
  /** 記述順のセクション（[global]は必ず1つ含まれる） */
  sections: readonly Ptp4lSection[];
  /** スレーブ指定から導出したクロックの役割 */
  clockRole: ClockRole;
  /** ヘッダコメントに埋め込むプロファイル名 */
  profileName: string;
}

export const GLOBAL_SECTION_HEADER = '[global]';
export const NMEA_SECTION_HEADER = '[nmea]';
