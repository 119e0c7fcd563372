/**
 * parse コマンド
 */

import { parsePtp4lConf } from '@ptpconf/core';
import { loadCliConfig, readTextFile, resolveFormat, type CommonOptions } from '../utils/input.js';
import { documentToJson, formatDocumentAsText, formatError } from '../utils/output.js';

export interface ParseCommandOptions extends CommonOptions {
  profile?: string;
}

/**
 * 設定ファイルをパースして構造を出力用の文字列にする
 */
export async function runParse(file: string, options: ParseCommandOptions): Promise<string> {
  const config = await loadCliConfig(options.config);
  const format = resolveFormat(options.format, config);

  const document = parsePtp4lConf(await readTextFile(file), { profileName: options.profile });

  return format === 'json'
    ? JSON.stringify(documentToJson(document), null, 2)
    : formatDocumentAsText(document);
}

/**
 * parse コマンドを実行
 */
export async function executeParse(file: string, options: ParseCommandOptions): Promise<void> {
  try {
    console.log(await runParse(file, options));
  } catch (error) {
    console.error(formatError(error));
    process.exit(1);
  }
}
