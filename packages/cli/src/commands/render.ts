/**
 * render コマンド
 */

import { parsePtp4lConf, renderPtp4lConf } from '@ptpconf/core';
import { loadCliConfig, readTextFile, resolveFormat, type CommonOptions } from '../utils/input.js';
import { formatError, formatIfacesAsText } from '../utils/output.js';

export interface RenderCommandOptions extends CommonOptions {
  profile?: string;
}

/**
 * ptp4l設定を再レンダリング
 * テキスト形式では設定本文の後にインターフェース一覧をコメントとして付ける
 */
export async function runRender(file: string, options: RenderCommandOptions): Promise<string> {
  const config = await loadCliConfig(options.config);
  const format = resolveFormat(options.format, config);

  const document = parsePtp4lConf(await readTextFile(file), { profileName: options.profile });
  const { text, ifaces, mapping } = renderPtp4lConf(document);

  if (format === 'json') {
    return JSON.stringify({ clockRole: document.clockRole, text, ifaces, mapping }, null, 2);
  }

  const summary = formatIfacesAsText(ifaces)
    .split('\n')
    .map((line) => `# ${line}`);
  return [text, '', `# Clock role: ${document.clockRole}`, ...summary].join('\n');
}

/**
 * render コマンドを実行
 */
export async function executeRender(file: string, options: RenderCommandOptions): Promise<void> {
  try {
    console.log(await runRender(file, options));
  } catch (error) {
    console.error(formatError(error));
    process.exit(1);
  }
}
