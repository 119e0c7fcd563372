/**
 * 入力ファイル・設定の解決
 */

import { readFile } from 'node:fs/promises';
import { ConfigLoader, type PtpConfConfig } from '@ptpconf/types';
import type { OutputFormat } from './output.js';

export interface CommonOptions {
  config?: string;
  format?: OutputFormat;
}

/**
 * 設定ファイルを解決して読み込む
 */
export async function loadCliConfig(configPath?: string): Promise<PtpConfConfig> {
  const { config } = await ConfigLoader.resolve({ configPath });
  return config;
}

/**
 * 出力形式を決定（コマンドライン > 設定ファイル）
 */
export function resolveFormat(format: string | undefined, config: PtpConfConfig): OutputFormat {
  if (format === undefined) {
    return config.output.format;
  }
  if (format !== 'text' && format !== 'json') {
    throw new Error(`Unknown format: ${format} (text, json)`);
  }
  return format;
}

/**
 * 設定テキストを読み込む
 */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    throw error;
  }
}

/**
 * `key=value` 形式の指定を設定マップに変換
 * 設定ファイルの synce.settings にコマンドラインの指定を上書きする
 */
export function parseSettings(
  entries: readonly string[],
  base: Readonly<Record<string, string>> = {}
): Record<string, string> {
  const settings: Record<string, string> = { ...base };
  for (const entry of entries) {
    const eq = entry.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Invalid setting (expected key=value): ${entry}`);
    }
    settings[entry.slice(0, eq)] = entry.slice(eq + 1);
  }
  return settings;
}
