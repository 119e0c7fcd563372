/**
 * @ptpconf/types
 * ptpconfの共通型定義
 */

// Section / Document
export type { SectionKind, Ptp4lSection, ClockRole, Ptp4lDocument } from './section.js';
export { GLOBAL_SECTION_HEADER, NMEA_SECTION_HEADER } from './section.js';

// Iface
export type { EventSource, Iface } from './iface.js';

// SyncE
export type { SynceDeviceConfig, QualityLevelInfo } from './synce.js';
export {
  SYNCE_NETWORK_OPT_1,
  SYNCE_NETWORK_OPT_2,
  EXTENDED_TLV_DISABLED,
  EXTENDED_TLV_ENABLED,
} from './synce.js';

// Profile
export type { PtpProfile } from './profile.js';

// Config
export type { PtpConfConfig, DaemonConfig, SynceConfig, OutputConfig } from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  validateConfig,
  type ResolveConfigOptions,
} from './config/index.js';
