import type { Ptp4lSection } from '@ptpconf/types';

/**
 * ヘッダコメント行（プロファイル名入り）と空行
 */
export function profileHeaderLines(profileName: string): string[] {
  return [`#profile: ${profileName}`, ''];
}

/**
 * セクションヘッダと `key value` 行
 * extra はセクション自身のオプションの後に出力する
 */
export function sectionLines(
  section: Ptp4lSection,
  extra: ReadonlyArray<readonly [string, string]> = []
): string[] {
  const lines = [section.header];
  for (const [key, value] of [...section.options, ...extra]) {
    lines.push(`${key} ${value}`);
  }
  return lines;
}
