/**
 * SyncEデバイス設定の型定義
 */

/** network_option のデフォルト値 */
export const SYNCE_NETWORK_OPT_1 = 1;
export const SYNCE_NETWORK_OPT_2 = 2;

/** extended_tlv の値 */
export const EXTENDED_TLV_DISABLED = 0;
export const EXTENDED_TLV_ENABLED = 1;

/**
 * Quality Levelの受信状態
 * synce4lの実行時に外部で更新される
 */
export interface QualityLevelInfo {
  priority: number;
  ssm: number;
  extendedSsm: number;
}

export interface SynceDeviceConfig {
  /** デバイス名（[<name>]の name） */
  name: string;
  /** 所属インターフェース（記述順） */
  ifaces: string[];
  /** クロックID（未割り当ては空文字列） */
  clockId: string;
  networkOption: number;
  extendedTlv: number;
  /** 外部ソース名（[{name}]の name、未指定は空文字列） */
  externalSource: string;
  /** 以下は実行時状態。ここでは初期化のみ */
  lastQlState: Map<string, QualityLevelInfo>;
  lastClockState: string;
}
