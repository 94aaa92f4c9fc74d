export * from './schema.js';
export {
  configuredModels,
  findPrompt,
  findPromptByCommand,
  getAlias,
  getDefaultProviderAndModel,
  getFullModelParams,
  getProviderConfig,
  loadConfig,
  parseConfig,
  resolveApiKey,
} from './config.js';
