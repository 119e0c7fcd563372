/**
 * 出力フォーマットユーティリティ
 */

import type { Iface, Ptp4lDocument, SynceDeviceConfig } from '@ptpconf/types';
import { Ptp4lConfError } from '@ptpconf/core';

export type OutputFormat = 'text' | 'json';

/**
 * セクションをJSON出力用のプレーンな値に変換
 */
export function documentToJson(document: Ptp4lDocument): object {
  return {
    profileName: document.profileName,
    clockRole: document.clockRole,
    sections: document.sections.map((section) => ({
      kind: section.kind,
      name: section.name,
      header: section.header,
      options: Object.fromEntries(section.options),
    })),
  };
}

/**
 * SyncEデバイスをJSON出力用の値に変換（実行時状態は除く）
 */
export function deviceToJson(device: SynceDeviceConfig): object {
  return {
    name: device.name,
    ifaces: device.ifaces,
    clockId: device.clockId,
    networkOption: device.networkOption,
    extendedTlv: device.extendedTlv,
    externalSource: device.externalSource,
  };
}

/**
 * パース結果をテキスト形式で出力
 */
export function formatDocumentAsText(document: Ptp4lDocument): string {
  const lines: string[] = [];
  lines.push(`Clock role: ${document.clockRole}`);
  lines.push(`Sections:   ${document.sections.length}`);
  lines.push('');

  for (const section of document.sections) {
    lines.push(`${section.header} (${section.kind})`);
    for (const [key, value] of section.options) {
      lines.push(`  ${key} = ${value}`);
    }
  }

  return lines.join('\n');
}

/**
 * インターフェース一覧をテキスト形式で出力
 */
export function formatIfacesAsText(ifaces: readonly Iface[]): string {
  if (ifaces.length === 0) {
    return 'Interfaces: (none)';
  }
  const lines = ['Interfaces:'];
  for (const iface of ifaces) {
    lines.push(`  ${iface.name}  source=${iface.source}  master=${iface.isMaster ? 'yes' : 'no'}`);
  }
  return lines.join('\n');
}

/**
 * SyncEデバイス一覧をテキスト形式で出力
 */
export function formatDevicesAsText(devices: readonly SynceDeviceConfig[]): string {
  if (devices.length === 0) {
    return 'SyncE devices: (none)';
  }
  const lines = ['SyncE devices:'];
  for (const device of devices) {
    lines.push(`  ${device.name}`);
    lines.push(`    Ifaces:          ${device.ifaces.join(', ') || '(none)'}`);
    lines.push(`    Clock ID:        ${device.clockId || '(unassigned)'}`);
    lines.push(`    Network option:  ${device.networkOption}`);
    lines.push(`    Extended TLV:    ${device.extendedTlv}`);
    if (device.externalSource) {
      lines.push(`    External source: ${device.externalSource}`);
    }
  }
  return lines.join('\n');
}

/**
 * エラーを表示用の文字列に変換
 */
export function formatError(error: unknown): string {
  if (error instanceof Ptp4lConfError) {
    return `エラー [${error.code}]: ${error.message}`;
  }
  if (error instanceof Error) {
    return `エラー: ${error.message}`;
  }
  return `エラー: ${String(error)}`;
}
