import type { Ptp4lDocument } from '@ptpconf/types';
import { Ptp4lConfError } from '../errors.js';
import { extractSynceRelations } from '../synce/relation-extractor.js';
import type { SynceRelations } from '../synce/relations.js';
import { profileHeaderLines, sectionLines } from './format.js';

export interface SynceRenderResult {
  /** synce4l設定テキスト（clock_id 付与済み） */
  text: string;
  /** クロックID割り当て済みの関係 */
  relations: SynceRelations;
}

/**
 * synce4l設定をテキストに戻す
 *
 * N番目のデバイスセクションは relations の N番目のデバイスに対応する。
 * clock_id が未記述のデバイスセクションには割り当てたIDを追記する。
 *
 * @throws {Ptp4lConfError} STRUCTURAL_MISMATCH デバイス数が一致しない場合
 */
export function renderSynce4lConf(
  document: Ptp4lDocument,
  settings: Readonly<Record<string, string>>
): SynceRenderResult {
  const relations = extractSynceRelations(document);
  relations.assignClockIds(settings);

  const deviceSections = document.sections.filter((section) => section.kind === 'device');
  if (deviceSections.length !== relations.devices.length) {
    throw new Ptp4lConfError(
      `SyncE device count mismatch: ${deviceSections.length} device sections, ${relations.devices.length} devices extracted`,
      'STRUCTURAL_MISMATCH'
    );
  }

  const lines = profileHeaderLines(document.profileName);
  let deviceIdx = 0;

  for (const section of document.sections) {
    if (section.kind !== 'device') {
      lines.push(...sectionLines(section));
      continue;
    }

    const device = relations.devices[deviceIdx++];
    if (section.options.has('clock_id')) {
      lines.push(...sectionLines(section));
    } else if (device === undefined || device.clockId === '') {
      console.warn(`[SynceRenderer] no clock_id assigned for ${section.header}`);
      lines.push(...sectionLines(section));
    } else {
      lines.push(...sectionLines(section, [['clock_id', device.clockId]]));
    }
  }

  return { text: lines.join('\n'), relations };
}
