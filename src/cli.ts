import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { Command, CommanderError, type OutputConfiguration } from "commander";

import { loadConfig } from "./config.js";
import { convertPdf } from "./convert.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import type { ConversionRequest, ConverterConfig, ParserFactory } from "./types.js";
import { errorMessage } from "./utils.js";

export type CliVariant = "pdf2x" | "pdf2md";

export type CliDeps = {
  loadConfig?: () => ConverterConfig;
  createParser?: ParserFactory;
  logger?: Logger;
  output?: OutputConfiguration;
};

type CliOptions = {
  output?: string;
  format?: string;
};

function readVersion(): string {
  const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, { encoding: "utf-8" }));
  return typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";
}

/**
 * `pdf2x` converts to any format; `pdf2md` is the same command with the
 * format pinned to markdown.
 */
export function createProgram(
  variant: CliVariant,
  run: (request: ConversionRequest) => Promise<void>
): Command {
  const program = new Command(variant)
    .version(readVersion())
    .argument("<pdf_path>", "Path to the PDF file to convert")
    .allowExcessArguments(false)
    .exitOverride();

  if (variant === "pdf2md") {
    program
      .description("Convert PDF to Markdown using LlamaParse")
      .option("-o, --output <path>", "Path for the output markdown file");
  } else {
    program
      .description("Convert PDF to various formats using LlamaParse")
      .option("-o, --output <path>", "Path for the output file")
      .option(
        "-f, --format <format>",
        "Output format: markdown, text or json",
        "markdown"
      );
  }

  program.action(async (pdfPath: string, options: CliOptions) => {
    await run({
      inputPath: pdfPath,
      outputPath: options.output,
      format: variant === "pdf2md" ? "markdown" : options.format,
    });
  });

  return program;
}

/** Runs one CLI invocation and resolves with the process exit code. */
export async function runCli(
  variant: CliVariant,
  argv: string[],
  deps: CliDeps = {}
): Promise<number> {
  let logger: Logger = deps.logger ?? new ConsoleLogger();

  const program = createProgram(variant, async (request) => {
    const config = (deps.loadConfig ?? loadConfig)();
    if (!deps.logger) logger = new ConsoleLogger(config.logLevel);

    await convertPdf(request, {
      config,
      createParser: deps.createParser,
      logger,
    });
  });

  if (deps.output) program.configureOutput(deps.output);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Usage errors, --help and --version; commander has already printed.
    if (err instanceof CommanderError) return err.exitCode;

    logger.error(`Conversion failed: ${errorMessage(err)}`);
    return 1;
  }
}
