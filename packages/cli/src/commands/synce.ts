/**
 * synce コマンド
 */

import { parsePtp4lConf, renderSynce4lConf } from '@ptpconf/core';
import {
  loadCliConfig,
  parseSettings,
  readTextFile,
  resolveFormat,
  type CommonOptions,
} from '../utils/input.js';
import { deviceToJson, formatDevicesAsText, formatError } from '../utils/output.js';

export interface SynceCommandOptions extends CommonOptions {
  profile?: string;
  /** key=value 形式（例: clockId[ens1f0]=0x1111） */
  setting?: string[];
}

/**
 * synce4l設定をクロックID付きで再レンダリング
 */
export async function runSynce(file: string, options: SynceCommandOptions): Promise<string> {
  const config = await loadCliConfig(options.config);
  const format = resolveFormat(options.format, config);
  const settings = parseSettings(options.setting ?? [], config.synce.settings);

  const document = parsePtp4lConf(await readTextFile(file), { profileName: options.profile });
  const { text, relations } = renderSynce4lConf(document, settings);

  if (format === 'json') {
    return JSON.stringify({ text, devices: relations.devices.map(deviceToJson) }, null, 2);
  }

  const summary = formatDevicesAsText(relations.devices)
    .split('\n')
    .map((line) => `# ${line}`);
  return [text, '', ...summary].join('\n');
}

/**
 * synce コマンドを実行
 */
export async function executeSynce(file: string, options: SynceCommandOptions): Promise<void> {
  try {
    console.log(await runSynce(file, options));
  } catch (error) {
    console.error(formatError(error));
    process.exit(1);
  }
}
