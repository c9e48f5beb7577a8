export { WanwatchConfigSchema, DEFAULT_CONFIG, type WanwatchConfig } from './schema.js';
export { loadConfig, type LoadConfigOptions, type LoadedConfig } from './loader.js';
export { validateConfig, type ValidationResult, type ValidationIssue } from './validator.js';
export { resolveWanwatchHome, resolveConfigPath, CONFIG_FILE_NAME } from './paths.js';
