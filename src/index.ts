export * from './features/playback-readiness';
export { ConfigError, loadConfig, type AppConfig, type LogLevelName } from './lib/config';
export { Logger, LogLevel, createLogger } from './lib/logger';
