/**
 * Renderer exports
 */

export { renderPtp4lConf, type Ptp4lRenderResult } from './ptp4l-renderer.js';
export { renderSynce4lConf, type SynceRenderResult } from './synce-renderer.js';
