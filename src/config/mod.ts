// Config module exports

export {
  BlockcatConfig,
  getConfigFilePath,
  parseValue,
  type ConfigLoadOptions,
  type ConfigProperty,
  type ConfigSchema,
  type ConfigSource,
} from './config.ts';
export { parseCliFlags, generateFlagHelp, generateEnvVarHelp, type ParsedCliFlags } from './cli.ts';
export {
  resolveImageFile,
  resolveOutputFormat,
  resolveRenderOptions,
  resolveTerminalCells,
  type RenderEnvironment,
} from './options.ts';
