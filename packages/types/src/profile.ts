/**
 * コントローラから配布されるノードプロファイルの型定義
 *
 * Note: コントローラ側のJSONに合わせて、未設定のフィールドは null の場合がある
 */

export interface PtpProfile {
  name?: string | null;
  interface?: string | null;
  ptp4lOpts?: string | null;
  phc2sysOpts?: string | null;
  ts2phcOpts?: string | null;
  ts2phcConf?: string | null;
  synce4lOpts?: string | null;
  synce4lConf?: string | null;
  ptp4lConf?: string | null;
  ptpSchedulingPolicy?: string | null;
  ptpSchedulingPriority?: number | null;
  ptpSettings?: Record<string, string> | null;
}
