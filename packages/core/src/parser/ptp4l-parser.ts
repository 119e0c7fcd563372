import type { ClockRole, Ptp4lDocument, Ptp4lSection, SectionKind } from '@ptpconf/types';
import { GLOBAL_SECTION_HEADER } from '@ptpconf/types';
import { Ptp4lConfError } from '../errors.js';

export interface ParseOptions {
  /** レンダリング時のヘッダに使うプロファイル名 */
  profileName?: string;
}

interface OpenSection {
  kind: SectionKind;
  name: string;
  header: string;
  options: Map<string, string>;
}

/** セクション名から取り除く区切り文字 */
const SECTION_DECORATION = /[{}<>[\] ]+/g;

/**
 * スレーブ側ポートを示すオプション
 * いずれかが存在すればGrandMasterではない
 */
const SLAVE_FLAGS: ReadonlyArray<readonly [string, string]> = [
  ['masterOnly', '0'],
  ['serverOnly', '0'],
  ['slaveOnly', '1'],
  ['clientOnly', '1'],
];

/**
 * ヘッダ文字列からセクション名を取り出す
 */
export function stripSectionName(header: string): string {
  return header.replace(SECTION_DECORATION, '');
}

/**
 * ヘッダ文字列からセクションの種類を判定
 */
export function classifySection(header: string): SectionKind {
  if (header.startsWith('[<')) {
    return 'device';
  }
  if (header.startsWith('[{')) {
    return 'externalSource';
  }
  return 'plain';
}

function isSlaveFlag(key: string, value: string): boolean {
  const normalized = value.trim();
  return SLAVE_FLAGS.some(([flagKey, flagValue]) => flagKey === key && flagValue === normalized);
}

function classifyClockRole(hasSlaveConfig: boolean, sectionCount: number): ClockRole {
  if (!hasSlaveConfig) {
    // スレーブポートなし
    return 'GrandMaster';
  }
  if (sectionCount > 2) {
    // [global] + 複数ポートのうち少なくとも1つがスレーブ
    return 'BoundaryClock';
  }
  return 'OrdinaryClock';
}

/**
 * ptp4l形式の設定テキストをパース
 *
 * - `#` で始まる行と空行は無視
 * - `[` で始まる行で新しいセクションを開始（`]` がなければエラー）
 * - セクション内の行は最初の空白で key / value に分割（空白のない行は無視）
 * - セクション前のオプション行はエラー
 * - [global] がなければ空のセクションを追加
 *
 * @throws {Ptp4lConfError} MALFORMED_SECTION / OPTION_OUTSIDE_SECTION
 */
export function parsePtp4lConf(
  text: string | null | undefined,
  options: ParseOptions = {}
): Ptp4lDocument {
  const sections: Ptp4lSection[] = [];
  let current: OpenSection | null = null;
  let hasSlaveConfig = false;

  for (const rawLine of (text ?? '').split('\n')) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      continue;
    }

    if (line.startsWith('[')) {
      if (current) {
        sections.push(current);
      }

      const closing = line.indexOf(']');
      if (closing < 0) {
        throw new Ptp4lConfError(`Section missing closing ']': ${line}`, 'MALFORMED_SECTION', line);
      }

      const header = line.slice(0, closing + 1);
      current = {
        kind: classifySection(header),
        name: stripSectionName(header),
        header,
        options: new Map(),
      };
      continue;
    }

    if (!current) {
      throw new Ptp4lConfError(`Config option not in section: ${line}`, 'OPTION_OUTSIDE_SECTION', line);
    }

    const split = line.indexOf(' ');
    if (split > 0) {
      const key = line.slice(0, split);
      const value = line.slice(split + 1);
      current.options.set(key, value);
      if (isSlaveFlag(key, value)) {
        hasSlaveConfig = true;
      }
    }
  }

  if (current) {
    sections.push(current);
  }

  if (!sections.some((section) => section.header === GLOBAL_SECTION_HEADER)) {
    sections.push({
      kind: 'plain',
      name: stripSectionName(GLOBAL_SECTION_HEADER),
      header: GLOBAL_SECTION_HEADER,
      options: new Map(),
    });
  }

  return {
    sections,
    clockRole: classifyClockRole(hasSlaveConfig, sections.length),
    profileName: options.profileName ?? '',
  };
}
