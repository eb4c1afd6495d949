import { access, constants, mkdir, stat, writeFile } from "node:fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";

import { LlamaParseClient } from "./client.js";
import {
  ConfigurationError,
  EmptyResultError,
  ExternalServiceError,
  InvalidArgumentError,
  LlamaParseError,
  NotFoundError,
  PermissionError,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type {
  ConversionRequest,
  ConversionResult,
  ConverterConfig,
  OutputFormat,
  ParsedDocument,
  ParserFactory,
} from "./types.js";
import { errorMessage } from "./utils.js";

export const OUTPUT_EXTENSIONS: Record<OutputFormat, string> = {
  markdown: ".md",
  text: ".txt",
  json: ".json",
};

const INPUT_EXTENSION = ".pdf";

export type ConverterDeps = {
  config: ConverterConfig;
  createParser?: ParserFactory;
  logger?: Logger;
};

export const createLlamaParser: ParserFactory = (options) =>
  new LlamaParseClient(options);

function isOutputFormat(value: string): value is OutputFormat {
  return Object.hasOwn(OUTPUT_EXTENSIONS, value);
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function isPermissionDenied(err: unknown): boolean {
  const code = errnoCode(err);
  return code === "EACCES" || code === "EPERM";
}

/** Case-insensitive; anything but markdown, text or json is rejected. */
export function parseFormat(value: string): OutputFormat {
  const normalized = value.toLowerCase();
  if (isOutputFormat(normalized)) return normalized;

  throw new InvalidArgumentError(
    `Unsupported format: ${normalized}. Use 'markdown', 'text', or 'json'`
  );
}

/**
 * The explicit output path when given, otherwise the input path with its
 * extension swapped for the format's one.
 */
export function resolveOutputPath(
  inputPath: string,
  format: OutputFormat,
  outputPath?: string
): string {
  if (outputPath) return path.resolve(outputPath);

  const { dir, name } = path.parse(path.resolve(inputPath));
  return path.join(dir, `${name}${OUTPUT_EXTENSIONS[format]}`);
}

async function validateInput(inputPath: string): Promise<void> {
  if (path.extname(inputPath).toLowerCase() !== INPUT_EXTENSION) {
    throw new InvalidArgumentError(`Input file must be a PDF: ${inputPath}`);
  }

  let stats: Stats;
  try {
    stats = await stat(inputPath);
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new NotFoundError(`PDF file not found: ${inputPath}`);
    }
    if (isPermissionDenied(err)) {
      throw new PermissionError(`No read permission for file: ${inputPath}`);
    }
    throw err;
  }

  if (!stats.isFile()) {
    throw new InvalidArgumentError(`Path exists but is not a file: ${inputPath}`);
  }

  try {
    await access(inputPath, constants.R_OK);
  } catch {
    throw new PermissionError(`No read permission for file: ${inputPath}`);
  }
}

async function prepareOutputDir(outputPath: string): Promise<void> {
  const dir = path.dirname(outputPath);

  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    if (isPermissionDenied(err)) {
      throw new PermissionError(`No write permission for directory: ${dir}`);
    }
    throw err;
  }

  try {
    await access(dir, constants.W_OK);
  } catch {
    throw new PermissionError(`No write permission for directory: ${dir}`);
  }
}

async function runConversion(
  request: ConversionRequest,
  deps: ConverterDeps,
  logger: Logger
): Promise<ConversionResult> {
  const apiKey = deps.config.apiKey?.trim();
  if (!apiKey) {
    throw new ConfigurationError(
      "LLAMA_CLOUD_API_KEY environment variable is not set"
    );
  }

  const format = parseFormat(request.format ?? "markdown");
  const inputPath = path.resolve(request.inputPath);
  await validateInput(inputPath);

  logger.info(`Processing PDF file: ${inputPath}`);

  const createParser = deps.createParser ?? createLlamaParser;
  let documents: ParsedDocument[];

  try {
    const parser = createParser({
      apiKey,
      resultType: format,
      baseUrl: deps.config.baseUrl,
      verbose: true,
      premiumMode: true,
      continuousMode: true,
      logger,
    });
    documents = await parser.loadData(inputPath);
  } catch (err) {
    if (err instanceof LlamaParseError) throw new ExternalServiceError(err);
    throw err;
  }

  const [first] = documents;
  if (!first) {
    throw new EmptyResultError();
  }

  const outputPath = resolveOutputPath(inputPath, format, request.outputPath);
  await prepareOutputDir(outputPath);
  await writeFile(outputPath, first.text, "utf8");

  logger.info(
    `Successfully converted PDF to ${format.toUpperCase()}: ${outputPath}`
  );

  return { outputPath, format, text: first.text };
}

/**
 * Convert a PDF with LlamaParse and write the first returned document to
 * disk. Any failure is logged and rethrown.
 */
export async function convertPdf(
  request: ConversionRequest,
  deps: ConverterDeps
): Promise<ConversionResult> {
  const logger = deps.logger ?? silentLogger;

  try {
    return await runConversion(request, deps, logger);
  } catch (err) {
    logger.error(`Failed to convert PDF: ${errorMessage(err)}`);
    throw err;
  }
}

export function convertPdfToMarkdown(
  request: Omit<ConversionRequest, "format">,
  deps: ConverterDeps
): Promise<ConversionResult> {
  return convertPdf({ ...request, format: "markdown" }, deps);
}
