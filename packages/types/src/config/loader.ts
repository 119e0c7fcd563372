import { readFile, access } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { PtpConfConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .ptpconf.json > ptpconf.json
 */
const CONFIG_FILE_NAMES = ['.ptpconf.json', 'ptpconf.json'] as const;

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス
   * @returns 設定オブジェクト（存在しなければデフォルト設定）
   */
  static async load(configPath: string): Promise<PtpConfConfig> {
    try {
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      const config = validateConfig(parsed);

      return this.mergeWithDefaults(config);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // ファイルが存在しない場合はデフォルト設定を返す
        return DEFAULT_CONFIG;
      }
      throw error;
    }
  }

  /**
   * 設定ファイルを探索して読み込む
   * 明示的なパス > 環境変数 PTPCONF_CONFIG > 自動探索 の順
   */
  static async resolve(
    options: ResolveConfigOptions = {}
  ): Promise<{ config: PtpConfConfig; configPath: string | null }> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd() } = options;

    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);
    const config = configPath ? await this.load(configPath) : this.getDefaultConfig();

    return { config, configPath };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): PtpConfConfig {
    return DEFAULT_CONFIG;
  }

  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env.PTPCONF_CONFIG;
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(
    startDir: string,
    traverseUp: boolean
  ): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: Partial<PtpConfConfig>): PtpConfConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      daemon: {
        ptp4lConfPath: config.daemon?.ptp4lConfPath ?? DEFAULT_CONFIG.daemon.ptp4lConfPath,
      },
      synce: {
        settings: config.synce?.settings ?? DEFAULT_CONFIG.synce.settings,
      },
      output: {
        format: config.output?.format ?? DEFAULT_CONFIG.output.format,
      },
    };
  }
}
