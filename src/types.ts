import type { Logger } from "./logger.js";

export type OutputFormat = "markdown" | "text" | "json";

export type LlamaParseClientOptions = {
  apiKey: string;
  resultType?: OutputFormat; // default: markdown
  baseUrl?: string; // default: https://api.cloud.llamaindex.ai
  language?: string; // default: en
  premiumMode?: boolean;
  continuousMode?: boolean;
  timeoutMs?: number; // per request, default: 120000
  maxRetries?: number; // per request, default: 2
  checkIntervalMs?: number; // job polling, default: 1000
  maxTimeoutMs?: number; // whole job, default: 2000000
  verbose?: boolean;
  logger?: Logger;
  userAgent?: string; // default: pdf2x-node
};

export type LoadDataOptions = {
  signal?: AbortSignal;
};

export type ParsedDocument = {
  text: string;
  metadata: {
    jobId: string;
    resultType: OutputFormat;
  };
};

/** What the conversion driver needs from a parsing backend. */
export interface DocumentParser {
  loadData(filePath: string, options?: LoadDataOptions): Promise<ParsedDocument[]>;
}

export type ParserFactory = (options: LlamaParseClientOptions) => DocumentParser;

export type LogLevel = "debug" | "info" | "warn" | "error";

export type ConverterConfig = {
  apiKey?: string;
  baseUrl?: string;
  logLevel: LogLevel;
};

export type ConversionRequest = {
  inputPath: string;
  outputPath?: string;
  format?: string; // default: markdown, matched case-insensitively
};

export type ConversionResult = {
  outputPath: string;
  format: OutputFormat;
  text: string;
};
