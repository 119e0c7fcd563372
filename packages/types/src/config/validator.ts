import type { PtpConfConfig } from '../config.js';

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): Partial<PtpConfConfig> {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  // バージョンのチェック
  if (config.version !== undefined && typeof config.version !== 'string') {
    throw new Error('config.version must be a string');
  }

  // daemon設定のバリデーション
  if (config.daemon !== undefined) {
    validateDaemonConfig(config.daemon);
  }

  // synce設定のバリデーション
  if (config.synce !== undefined) {
    validateSynceConfig(config.synce);
  }

  // output設定のバリデーション
  if (config.output !== undefined) {
    validateOutputConfig(config.output);
  }

  return config as Partial<PtpConfConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateDaemonConfig(daemon: unknown): void {
  if (!isRecord(daemon)) {
    throw new Error('config.daemon must be an object');
  }

  if (daemon.ptp4lConfPath !== undefined && typeof daemon.ptp4lConfPath !== 'string') {
    throw new Error('config.daemon.ptp4lConfPath must be a string');
  }
}

function validateSynceConfig(synce: unknown): void {
  if (!isRecord(synce)) {
    throw new Error('config.synce must be an object');
  }

  if (synce.settings !== undefined) {
    if (!isRecord(synce.settings)) {
      throw new Error('config.synce.settings must be an object');
    }
    if (!Object.values(synce.settings).every((value) => typeof value === 'string')) {
      throw new Error('config.synce.settings must map strings to strings');
    }
  }
}

function validateOutputConfig(output: unknown): void {
  if (!isRecord(output)) {
    throw new Error('config.output must be an object');
  }

  if (output.format !== undefined && output.format !== 'text' && output.format !== 'json') {
    throw new Error('config.output.format must be "text" or "json"');
  }
}
