export { LlamaParseClient, DEFAULT_BASE_URL } from "./client.js";
export {
  convertPdf,
  convertPdfToMarkdown,
  createLlamaParser,
  parseFormat,
  resolveOutputPath,
  OUTPUT_EXTENSIONS,
} from "./convert.js";
export type { ConverterDeps } from "./convert.js";
export { loadConfig, API_KEY_ENV } from "./config.js";
export type { LoadConfigOptions } from "./config.js";
export { ConsoleLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { runCli } from "./cli.js";
export type { CliVariant, CliDeps } from "./cli.js";
export {
  LlamaParseError,
  ConversionError,
  ConfigurationError,
  InvalidArgumentError,
  NotFoundError,
  PermissionError,
  EmptyResultError,
  ExternalServiceError,
} from "./errors.js";
export type { LlamaParseErrorCode, ConversionErrorCode } from "./errors.js";
export type {
  OutputFormat,
  LlamaParseClientOptions,
  LoadDataOptions,
  ParsedDocument,
  DocumentParser,
  ParserFactory,
  ConverterConfig,
  ConversionRequest,
  ConversionResult,
  LogLevel,
} from "./types.js";
