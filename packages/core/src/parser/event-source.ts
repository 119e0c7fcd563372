import type { EventSource } from '@ptpconf/types';

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

/**
 * 設定値を真偽値として解釈
 * @returns 解釈できない場合は undefined
 */
export function parseBoolFlag(value: string): boolean | undefined {
  const trimmed = value.trim();
  if (TRUE_VALUES.has(trimmed)) {
    return true;
  }
  if (FALSE_VALUES.has(trimmed)) {
    return false;
  }
  return undefined;
}

/**
 * ts2phc.master の値からイベントソースを決定
 * 真ならGNSS、それ以外（解釈不能を含む）はPPS
 */
export function resolveSource(flag: string): EventSource {
  return parseBoolFlag(flag) === true ? 'GNSS' : 'PPS';
}
