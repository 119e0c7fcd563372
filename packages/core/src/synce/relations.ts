import type { SynceDeviceConfig } from '@ptpconf/types';
import { EXTENDED_TLV_DISABLED, SYNCE_NETWORK_OPT_1 } from '@ptpconf/types';

/**
 * 設定値のマップからインターフェースのクロックIDを引くキー
 * 例: clockId[ens1f0]
 */
export function clockIdSettingKey(iface: string): string {
  return `clockId[${iface}]`;
}

/**
 * デフォルト値で初期化したSyncEデバイス設定を作成
 */
export function createDeviceConfig(overrides: Partial<SynceDeviceConfig> = {}): SynceDeviceConfig {
  return {
    name: '',
    ifaces: [],
    clockId: '',
    networkOption: SYNCE_NETWORK_OPT_1,
    extendedTlv: EXTENDED_TLV_DISABLED,
    externalSource: '',
    lastQlState: new Map(),
    lastClockState: '',
    ...overrides,
  };
}

/**
 * SyncEデバイスとポートの関係
 */
export class SynceRelations {
  private readonly deviceConfigs: SynceDeviceConfig[] = [];

  /** 登録順のデバイス */
  get devices(): readonly SynceDeviceConfig[] {
    return this.deviceConfigs;
  }

  /**
   * デバイス設定を登録（コピーを保持）
   */
  registerDeviceConfig(config: SynceDeviceConfig): void {
    this.deviceConfigs.push({ ...config, ifaces: [...config.ifaces] });
  }

  /**
   * 未設定のデバイスにクロックIDを割り当て
   * 所属インターフェースを順に見て、最初に settings に見つかった値を使う
   */
  assignClockIds(settings: Readonly<Record<string, string>>): void {
    for (const device of this.deviceConfigs) {
      if (device.clockId !== '') {
        continue;
      }
      for (const iface of device.ifaces) {
        const clockId = settings[clockIdSettingKey(iface)];
        if (clockId !== undefined) {
          device.clockId = clockId;
          break;
        }
      }
    }
  }
}
