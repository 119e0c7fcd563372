import type { EventSource, Iface, Ptp4lDocument, Ptp4lSection } from '@ptpconf/types';
import { GLOBAL_SECTION_HEADER, NMEA_SECTION_HEADER } from '@ptpconf/types';
import { parseBoolFlag, resolveSource } from '../parser/event-source.js';
import { profileHeaderLines, sectionLines } from './format.js';

export interface Ptp4lRenderResult {
  /** 設定テキスト */
  text: string;
  /** インターフェース（記述順） */
  ifaces: Iface[];
  /** インターフェース名（記述順） */
  mapping: string[];
}

/** インターフェース名はヘッダから [ ] だけを取り除く */
const BRACKETS = /[[\]]/g;

/** [nmea] が現れる前のデフォルトソース */
const DEFAULT_SOURCE: EventSource = 'PPS';

function readMasterOnly(section: Ptp4lSection): boolean {
  const raw = section.options.get('masterOnly');
  if (raw === undefined) {
    return false;
  }
  const parsed = parseBoolFlag(raw);
  if (parsed === undefined) {
    console.warn(`[Ptp4lRenderer] invalid masterOnly value in ${section.header}: "${raw.trim()}"`);
    return false;
  }
  return parsed;
}

/**
 * ptp4l設定をテキストに戻し、インターフェース一覧を構築
 *
 * イベントソースはセクション自身の ts2phc.master、なければ
 * 直前までに現れた [nmea] の ts2phc.master を使う
 */
export function renderPtp4lConf(document: Ptp4lDocument): Ptp4lRenderResult {
  const lines = profileHeaderLines(document.profileName);
  const ifaces: Iface[] = [];
  const mapping: string[] = [];
  let nmeaSource = DEFAULT_SOURCE;

  for (const section of document.sections) {
    lines.push(...sectionLines(section));

    const ts2phcMaster = section.options.get('ts2phc.master');

    if (section.header === NMEA_SECTION_HEADER) {
      if (ts2phcMaster !== undefined) {
        nmeaSource = resolveSource(ts2phcMaster);
      }
      continue;
    }
    if (section.header === GLOBAL_SECTION_HEADER) {
      continue;
    }

    const name = section.header.replace(BRACKETS, '');
    mapping.push(name);
    ifaces.push({
      name,
      source: ts2phcMaster !== undefined ? resolveSource(ts2phcMaster) : nmeaSource,
      isMaster: readMasterOnly(section),
    });
  }

  return { text: lines.join('\n'), ifaces, mapping };
}
