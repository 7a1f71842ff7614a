export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { isMissingFile, JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export { Config } from "./core/config"
export { ConfigValidationError, type LoadConfigOptions, loadConfig } from "./core/load"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
