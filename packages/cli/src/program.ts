/**
 * ptpconf CLI のコマンド定義
 */

import { Command, Option } from 'commander';
import { createRequire } from 'node:module';
import { executeParse, type ParseCommandOptions } from './commands/parse.js';
import { executeRender, type RenderCommandOptions } from './commands/render.js';
import { executeSynce, type SynceCommandOptions } from './commands/synce.js';
import { executeProfiles, type ProfilesCommandOptions } from './commands/profiles.js';

// package.jsonからバージョンを読み込む（ソース実行・ビルド後のどちらでも解決できる）
const require = createRequire(import.meta.url);
const packageJson = require('@ptpconf/cli/package.json') as { version: string };

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(): Command {
  /**
   * グローバル設定（preSubcommandフックで設定）
   */
  let globalConfigPath: string | undefined;

  const program = new Command();

  program
    .name('ptpconf')
    .description('ptp4l / synce4l 設定のパース・レンダリングツール')
    .version(packageJson.version)
    .addOption(
      new Option('-c, --config <path>', '設定ファイルのパス')
        .env('PTPCONF_CONFIG')
    )
    .hook('preSubcommand', (thisCommand) => {
      const opts = thisCommand.opts<{ config?: string }>();
      globalConfigPath = opts.config;
    });

  program
    .command('parse')
    .description('設定ファイルをパースしてセクションとクロックの役割を表示')
    .argument('<file>', 'ptp4l設定ファイル')
    .option('--profile <name>', 'プロファイル名')
    .option('--format <format>', '出力形式 (text, json)')
    .action((file: string, options: ParseCommandOptions) => {
      void executeParse(file, { ...options, config: globalConfigPath });
    });

  program
    .command('render')
    .description('ptp4l設定を再レンダリングしてインターフェース一覧を表示')
    .argument('<file>', 'ptp4l設定ファイル')
    .option('--profile <name>', 'プロファイル名')
    .option('--format <format>', '出力形式 (text, json)')
    .action((file: string, options: RenderCommandOptions) => {
      void executeRender(file, { ...options, config: globalConfigPath });
    });

  program
    .command('synce')
    .description('synce4l設定をクロックID付きで再レンダリング')
    .argument('<file>', 'synce4l設定ファイル')
    .option('--profile <name>', 'プロファイル名')
    .option('--setting <key=value>', 'クロックID割り当て用の設定（複数指定可）', collect, [])
    .option('--format <format>', '出力形式 (text, json)')
    .action((file: string, options: SynceCommandOptions) => {
      void executeSynce(file, { ...options, config: globalConfigPath });
    });

  program
    .command('profiles')
    .description('ノードプロファイルのJSONを読み込んで各プロファイルをレンダリング')
    .argument('<file>', 'プロファイルJSONファイル')
    .option('--default-conf <path>', 'デフォルトのptp4l設定ファイル')
    .option('--format <format>', '出力形式 (text, json)')
    .action((file: string, options: ProfilesCommandOptions) => {
      void executeProfiles(file, { ...options, config: globalConfigPath });
    });

  return program;
}
