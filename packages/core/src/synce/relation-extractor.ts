import type { Ptp4lDocument, Ptp4lSection, SynceDeviceConfig } from '@ptpconf/types';
import { EXTENDED_TLV_DISABLED, GLOBAL_SECTION_HEADER, SYNCE_NETWORK_OPT_1 } from '@ptpconf/types';
import { SynceRelations, createDeviceConfig } from './relations.js';

/**
 * 走査中のデバイス
 * name が空のうちはどのデバイスにも属さない
 */
interface DeviceAccumulator {
  device: SynceDeviceConfig;
  ifaces: string[];
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

function emptyAccumulator(): DeviceAccumulator {
  return { device: createDeviceConfig(), ifaces: [] };
}

/**
 * 整数オプションを読む。解釈できなければログを出してデフォルト値を返す
 */
function readIntegerOption(section: Ptp4lSection, key: string, defaultValue: number): number {
  const raw = section.options.get(key);
  if (raw === undefined) {
    return defaultValue;
  }

  const trimmed = raw.trim();
  const value = INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    console.error(
      `[SynceExtractor] error parsing \`${key}\` in ${section.header}: "${trimmed}", using default ${defaultValue}`
    );
    return defaultValue;
  }
  // -0 は 0 に揃える
  return value === 0 ? 0 : value;
}

function flush(relations: SynceRelations, acc: DeviceAccumulator): void {
  if (acc.device.name === '') {
    return;
  }
  relations.registerDeviceConfig({ ...acc.device, ifaces: acc.ifaces });
}

function openDevice(section: Ptp4lSection): DeviceAccumulator {
  const device = createDeviceConfig({
    name: section.name,
    clockId: section.options.get('clock_id')?.trim() ?? '',
    networkOption: readIntegerOption(section, 'network_option', SYNCE_NETWORK_OPT_1),
    extendedTlv: readIntegerOption(section, 'extended_tlv', EXTENDED_TLV_DISABLED),
  });
  return { device, ifaces: [] };
}

/**
 * SyncEデバイスとポートの関係を抽出
 *
 * セクションは次の順で記述される:
 * 1. デバイスセクション `[<synce1>]` が1つの論理デバイスを定義する
 * 2. 以降、次のデバイスセクションまでの通常セクション（[global]以外）がそのデバイスのポート
 * 3. `[{name}]` はデバイスの外部ソースを指定する
 */
export function extractSynceRelations(document: Ptp4lDocument): SynceRelations {
  const relations = new SynceRelations();

  const last = document.sections.reduce<DeviceAccumulator>((acc, section) => {
    switch (section.kind) {
      case 'device':
        flush(relations, acc);
        return openDevice(section);
      case 'externalSource':
        return { ...acc, device: { ...acc.device, externalSource: section.name } };
      case 'plain':
        if (section.header === GLOBAL_SECTION_HEADER) {
          return acc;
        }
        return { ...acc, ifaces: [...acc.ifaces, section.name] };
    }
  }, emptyAccumulator());

  flush(relations, last);

  return relations;
}
