export { ConfigLoader, type ResolveConfigOptions } from './loader.js';
export { validateConfig } from './validator.js';
