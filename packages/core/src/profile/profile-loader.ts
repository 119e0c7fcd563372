import { z } from 'zod';
import type { PtpProfile } from '@ptpconf/types';

const nullableString = z.string().nullable().optional();

/**
 * ノードプロファイルのスキーマ
 * 未知のフィールドはコントローラのバージョン差分として無視する
 */
export const ptpProfileSchema = z.object({
  name: nullableString,
  interface: nullableString,
  ptp4lOpts: nullableString,
  phc2sysOpts: nullableString,
  ts2phcOpts: nullableString,
  ts2phcConf: nullableString,
  synce4lOpts: nullableString,
  synce4lConf: nullableString,
  ptp4lConf: nullableString,
  ptpSchedulingPolicy: nullableString,
  ptpSchedulingPriority: z.number().int().nullable().optional(),
  ptpSettings: z.record(z.string()).nullable().optional(),
});

const profileListSchema = z.array(ptpProfileSchema);

export type ProfileFormat = 'list' | 'legacy';

export interface LoadedProfiles {
  format: ProfileFormat;
  profiles: PtpProfile[];
}

function parseJson(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    return undefined;
  }
}

/**
 * ノードプロファイルのJSONを読み込む
 * 1. 複数プロファイル（配列）形式
 * 2. 後方互換のため単一プロファイル（オブジェクト）形式
 * `null` は空の一覧
 * @returns どちらの形式でもなければ null
 */
export function loadNodeProfiles(json: string): LoadedProfiles | null {
  const parsed = parseJson(json);
  if (parsed === undefined) {
    return null;
  }
  if (parsed === null) {
    // JSONの null は空のプロファイル一覧として扱う
    return { format: 'list', profiles: [] };
  }

  const list = profileListSchema.safeParse(parsed);
  if (list.success) {
    return { format: 'list', profiles: list.data };
  }

  const single = ptpProfileSchema.safeParse(parsed);
  if (single.success) {
    return { format: 'legacy', profiles: [single.data] };
  }

  return null;
}

/**
 * ノードプロファイルのJSONをプロファイル一覧に変換
 */
export function parseNodeProfiles(json: string): PtpProfile[] | null {
  return loadNodeProfiles(json)?.profiles ?? null;
}
