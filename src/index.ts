export * as ast from "./ast";
export { parseFile, parseFileFromPath, loadFile, ParserError } from "./parser";
export { programFromFile, renameProgram } from "./program";
export type { Program } from "./program";
export { ImportError } from "./errors";
export type { ImportErrorKind } from "./errors";
export {
  SOURCE_DIRECTORY_NAME,
  SOURCE_FILE_EXTENSION,
  entryFileName,
  parseImportFile,
  readDirEntries,
  trimEndMatches,
} from "./loader";
export type { DirEntry } from "./loader";
export { DefinitionStore, newScope } from "./definitions";
export type { DefinitionValue } from "./definitions";
export { ImportResolver } from "./imports";
export type { ImportResolverOptions } from "./imports";
export * from "./typecheck";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
export { configFromEnv, parseLogLevel, parseOutputFormat, ConfigError } from "./config";
export type { Config, LogLevel, OutputFormat } from "./config";
