export {
  loadConfig,
  mergeConfigs,
  applyEnvOverrides,
  resolveModelSettings,
  type ConfigLoadResult,
  type ConfigLoadOptions,
  type ResolvedModelSettings,
} from './config-manager.js';
export * from './schema.js';
