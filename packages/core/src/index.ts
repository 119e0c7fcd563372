/**
 * @ptpconf/core
 *
 * ptp4l / synce4l 設定のパースとレンダリング
 */

export { Ptp4lConfError, type Ptp4lConfErrorCode } from './errors.js';
export {
  parsePtp4lConf,
  classifySection,
  stripSectionName,
  type ParseOptions,
} from './parser/ptp4l-parser.js';
export { resolveSource, parseBoolFlag } from './parser/event-source.js';
export { extractSynceRelations } from './synce/relation-extractor.js';
export { SynceRelations, createDeviceConfig, clockIdSettingKey } from './synce/relations.js';
export {
  renderPtp4lConf,
  renderSynce4lConf,
  type Ptp4lRenderResult,
  type SynceRenderResult,
} from './renderer/index.js';
export {
  loadNodeProfiles,
  parseNodeProfiles,
  ptpProfileSchema,
  type LoadedProfiles,
  type ProfileFormat,
} from './profile/profile-loader.js';
export {
  PtpConfUpdate,
  type PtpConfUpdateEvents,
  type RenderedProfile,
  type RenderedSynceProfile,
} from './update/conf-update.js';
