/**
 * profiles コマンド
 */

import { PtpConfUpdate } from '@ptpconf/core';
import { loadCliConfig, readTextFile, resolveFormat, type CommonOptions } from '../utils/input.js';
import { deviceToJson, formatError } from '../utils/output.js';

export interface ProfilesCommandOptions extends CommonOptions {
  /** デフォルトのptp4l設定ファイル（未指定なら設定ファイルの daemon.ptp4lConfPath） */
  defaultConf?: string;
}

/**
 * ノードプロファイルのJSONを読み込み、各プロファイルをレンダリング
 */
export async function runProfiles(file: string, options: ProfilesCommandOptions): Promise<string> {
  const config = await loadCliConfig(options.config);
  const format = resolveFormat(options.format, config);

  const update = await PtpConfUpdate.create(options.defaultConf ?? config.daemon.ptp4lConfPath);
  if (!update.updateConfig(await readTextFile(file))) {
    return format === 'json' ? '[]' : 'No profile to apply';
  }

  const rendered = update.profiles.map((profile) => ({
    ptp4l: update.renderProfile(profile),
    synce4l: update.renderSynceProfile(profile),
  }));

  if (format === 'json') {
    return JSON.stringify(
      rendered.map(({ ptp4l, synce4l }) => ({
        ...ptp4l,
        synce4l: synce4l && {
          text: synce4l.text,
          devices: synce4l.relations.devices.map(deviceToJson),
        },
      })),
      null,
      2
    );
  }

  const blocks = rendered.map(({ ptp4l, synce4l }) => {
    const lines = [`=== ${ptp4l.profileName || '(unnamed)'} (${ptp4l.clockRole}) ===`, ptp4l.text];
    if (synce4l) {
      lines.push('', '--- synce4l ---', synce4l.text);
    }
    return lines.join('\n');
  });
  return blocks.join('\n\n');
}

/**
 * profiles コマンドを実行
 */
export async function executeProfiles(file: string, options: ProfilesCommandOptions): Promise<void> {
  try {
    console.log(await runProfiles(file, options));
  } catch (error) {
    console.error(formatError(error));
    process.exit(1);
  }
}
