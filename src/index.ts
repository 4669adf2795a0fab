// Public API
export * from './schema/encounter.js';
export * from './engine/encounter/errors.js';
export * from './engine/encounter/rng.js';
export * from './engine/encounter/registry.js';
export * from './engine/encounter/scaling.js';
export * from './engine/encounter/elite.js';
export * from './engine/encounter/selection.js';
export * from './engine/encounter/synergy.js';
export * from './engine/encounter/conversion.js';
export * from './engine/encounter/room-encounter.js';
export * from './engine/encounter/validation.js';
export * from './engine/encounter/analytics.js';
export * from './data/content-loader.js';
export * from './services/encounter.service.js';
export { type EncounterConfig, DEFAULT_CONTENT_DIR, loadEncounterConfig } from './utils/config.js';
export { type LogLevel, type Logger, createLogger, setLogLevel, setLogSink } from './utils/logger.js';
