/**
 * インターフェース（ポート）関連の型定義
 */

/** イベントの発生源 */
export type EventSource = 'GNSS' | 'PPS';

export interface Iface {
  /** インターフェース名 */
  name: string;
  /** ts2phc.master から解決したイベントソース */
  source: EventSource;
  /** masterOnly が真かどうか */
  isMaster: boolean;
  /** PHC ID（外部で付与、ここでは設定しない） */
  phcId?: string;
}
