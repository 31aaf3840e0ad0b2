export { loadConfig, parsePrefix, ConfigurationError, EnvironmentSchema } from './loader';
export type { GatehouseConfig, ListenAddress, LogLevelName } from './loader';
