import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fsp, { access, constants, mkdir } from "node:fs/promises";
import path from "node:path";

import {
  ConfigurationError,
  EmptyResultError,
  ExternalServiceError,
  InvalidArgumentError,
  LlamaParseError,
  NotFoundError,
  PermissionError,
  convertPdf,
  convertPdfToMarkdown,
  parseFormat,
  resolveOutputPath,
  type ConverterConfig,
  type ParsedDocument,
  type ParserFactory,
} from "../src/index.js";
import { RecordingLogger, makeTmpDir, writeDummyPdf } from "./helpers.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, access: vi.fn(actual.access), mkdir: vi.fn(actual.mkdir) };
});

const actualFs = await vi.importActual<typeof import("node:fs/promises")>("node:fs/promises");

function errnoError(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: permission denied`), { code });
}

/** Make `access` fail with EACCES for one mode and behave normally otherwise. */
function denyAccess(mode: number) {
  vi.mocked(access).mockImplementation(async (target, requested) => {
    if (requested === mode) throw errnoError("EACCES");
    return actualFs.access(target, requested);
  });
}

const config: ConverterConfig = { apiKey: "test-key", logLevel: "info" };

function doc(text: string): ParsedDocument {
  return { text, metadata: { jobId: "job-1", resultType: "markdown" } };
}

function fakeParser(result: ParsedDocument[] | Error) {
  const loadData = vi.fn(async (_filePath: string) => {
    if (result instanceof Error) throw result;
    return result;
  });
  const createParser = vi.fn<ParserFactory>(() => ({ loadData }));
  return { createParser, loadData };
}

describe("parseFormat", () => {
  it("accepts known formats case-insensitively", () => {
    expect(parseFormat("markdown")).toBe("markdown");
    expect(parseFormat("TEXT")).toBe("text");
    expect(parseFormat("Json")).toBe("json");
  });

  it("rejects anything else", () => {
    expect(() => parseFormat("docx")).toThrow(
      new InvalidArgumentError(
        "Unsupported format: docx. Use 'markdown', 'text', or 'json'"
      )
    );
  });
});

describe("resolveOutputPath", () => {
  it("swaps the extension for the format's one", () => {
    expect(resolveOutputPath("/data/report.pdf", "text")).toBe("/data/report.txt");
    expect(resolveOutputPath("/data/report.PDF", "markdown")).toBe("/data/report.md");
    expect(resolveOutputPath("/data/archive.v2.pdf", "json")).toBe("/data/archive.v2.json");
  });

  it("resolves an explicit output path", () => {
    expect(resolveOutputPath("/data/report.pdf", "text", "out/x.md")).toBe(
      path.resolve("out/x.md")
    );
  });
});

describe("convertPdf", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTmpDir();
  });

  afterEach(async () => {
    vi.mocked(access).mockImplementation(actualFs.access);
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it("fails with ConfigurationError when the credential is missing", async () => {
    const { createParser } = fakeParser([doc("Hello")]);

    await expect(
      convertPdf(
        { inputPath: path.join(dir, "missing.txt"), format: "docx" },
        { config: { logLevel: "info" }, createParser }
      )
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(createParser).not.toHaveBeenCalled();
  });

  it("treats a blank credential as missing", async () => {
    const inputPath = await writeDummyPdf(dir);
    const { createParser } = fakeParser([doc("Hello")]);

    await expect(
      convertPdf({ inputPath }, { config: { apiKey: "   ", logLevel: "info" }, createParser })
    ).rejects.toThrow(
      new ConfigurationError("LLAMA_CLOUD_API_KEY environment variable is not set")
    );
    expect(createParser).not.toHaveBeenCalled();
  });

  it("fails with InvalidArgumentError on an unknown format", async () => {
    const inputPath = await writeDummyPdf(dir);
    const { createParser } = fakeParser([doc("Hello")]);

    await expect(
      convertPdf({ inputPath, format: "html" }, { config, createParser })
    ).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(createParser).not.toHaveBeenCalled();
  });

  it("fails with InvalidArgumentError before any call when the input is not a .pdf", async () => {
    const inputPath = path.join(dir, "notes.txt");
    await fsp.writeFile(inputPath, "text");
    const { createParser } = fakeParser([doc("Hello")]);

    await expect(
      convertPdf({ inputPath }, { config, createParser })
    ).rejects.toThrow(new InvalidArgumentError(`Input file must be a PDF: ${inputPath}`));
    expect(createParser).not.toHaveBeenCalled();
  });

  it("checks the extension before existence", async () => {
    const { createParser } = fakeParser([doc("Hello")]);

    await expect(
      convertPdf({ inputPath: path.join(dir, "missing.docx") }, { config, createParser })
    ).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it("fails with NotFoundError when the input does not exist", async () => {
    const inputPath = path.join(dir, "missing.pdf");
    const { createParser } = fakeParser([doc("Hello")]);

    await expect(
      convertPdf({ inputPath }, { config, createParser })
    ).rejects.toThrow(new NotFoundError(`PDF file not found: ${inputPath}`));
  });

  it("fails with InvalidArgumentError when the input is a directory", async () => {
    const inputPath = path.join(dir, "folder.pdf");
    await fsp.mkdir(inputPath);
    const { createParser } = fakeParser([doc("Hello")]);

    await expect(
      convertPdf({ inputPath }, { config, createParser })
    ).rejects.toThrow(new InvalidArgumentError(`Path exists but is not a file: ${inputPath}`));
  });

  it("fails with PermissionError when the input is unreadable", async () => {
    const inputPath = await writeDummyPdf(dir);
    denyAccess(constants.R_OK);
    const { createParser } = fakeParser([doc("Hello")]);

    await expect(
      convertPdf({ inputPath }, { config, createParser })
    ).rejects.toThrow(new PermissionError(`No read permission for file: ${inputPath}`));
    expect(createParser).not.toHaveBeenCalled();
  });

  it("fails with PermissionError when the output directory is not writable", async () => {
    const inputPath = await writeDummyPdf(dir);
    denyAccess(constants.W_OK);
    const { createParser } = fakeParser([doc("Hello")]);

    const err = await convertPdf({ inputPath }, { config, createParser }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(PermissionError);
    expect(err).toMatchObject({
      code: "PERMISSION",
      message: `No write permission for directory: ${dir}`,
    });
    expect(await fsp.readdir(dir)).toEqual(["report.pdf"]);
  });

  it("fails with PermissionError when the output directory cannot be created", async () => {
    const inputPath = await writeDummyPdf(dir);
    const outputPath = path.join(dir, "locked", "out.md");
    vi.mocked(mkdir).mockRejectedValueOnce(errnoError("EPERM"));
    const { createParser } = fakeParser([doc("Hello")]);

    await expect(
      convertPdf({ inputPath, outputPath }, { config, createParser })
    ).rejects.toThrow(
      new PermissionError(`No write permission for directory: ${path.join(dir, "locked")}`)
    );
    expect(await fsp.readdir(dir)).toEqual(["report.pdf"]);
  });

  it("writes the text beside the input with the format's extension", async () => {
    const inputPath = await writeDummyPdf(dir);
    const { createParser } = fakeParser([doc("Hello")]);

    const result = await convertPdf(
      { inputPath, format: "text" },
      { config, createParser }
    );

    const expectedPath = path.join(dir, "report.txt");
    expect(result).toEqual({ outputPath: expectedPath, format: "text", text: "Hello" });
    expect(await fsp.readFile(expectedPath, "utf8")).toBe("Hello");
  });

  it("accepts an upper-case .PDF extension and format", async () => {
    const inputPath = await writeDummyPdf(dir, "SCAN.PDF");
    const { createParser } = fakeParser([doc("Scanned")]);

    const result = await convertPdf(
      { inputPath, format: "MARKDOWN" },
      { config, createParser }
    );

    expect(result.outputPath).toBe(path.join(dir, "SCAN.md"));
  });

  it("configures the parser for premium, continuous parsing", async () => {
    const inputPath = await writeDummyPdf(dir);
    const { createParser, loadData } = fakeParser([doc("{}")]);

    await convertPdf(
      { inputPath, format: "json" },
      { config: { ...config, baseUrl: "https://parse.test" }, createParser }
    );

    expect(createParser).toHaveBeenCalledWith(
      expect.objectContaining({
        apiKey: "test-key",
        resultType: "json",
        baseUrl: "https://parse.test",
        premiumMode: true,
        continuousMode: true,
        verbose: true,
      })
    );
    expect(loadData).toHaveBeenCalledWith(inputPath);
  });

  it("writes only the first document, verbatim", async () => {
    const inputPath = await writeDummyPdf(dir);
    const { createParser } = fakeParser([doc("  first\n\n"), doc("second")]);

    const result = await convertPdf({ inputPath }, { config, createParser });

    expect(await fsp.readFile(result.outputPath, "utf8")).toBe("  first\n\n");
  });

  it("does not validate json output", async () => {
    const inputPath = await writeDummyPdf(dir);
    const { createParser } = fakeParser([doc("not json {")]);

    const result = await convertPdf(
      { inputPath, format: "json" },
      { config, createParser }
    );

    expect(result.outputPath).toBe(path.join(dir, "report.json"));
    expect(await fsp.readFile(result.outputPath, "utf8")).toBe("not json {");
  });

  it("creates missing parent directories and overwrites existing files", async () => {
    const inputPath = await writeDummyPdf(dir);
    const outputPath = path.join(dir, "nested", "deeper", "out.md");
    const { createParser } = fakeParser([doc("new")]);

    await convertPdf({ inputPath, outputPath }, { config, createParser });
    expect(await fsp.readFile(outputPath, "utf8")).toBe("new");

    const second = fakeParser([doc("newer")]);
    await convertPdf({ inputPath, outputPath }, { config, createParser: second.createParser });
    expect(await fsp.readFile(outputPath, "utf8")).toBe("newer");
  });

  it("fails with EmptyResultError and leaves the output untouched", async () => {
    const inputPath = await writeDummyPdf(dir);
    const outputPath = path.join(dir, "report.md");
    await fsp.writeFile(outputPath, "old");
    const { createParser } = fakeParser([]);

    await expect(
      convertPdf({ inputPath }, { config, createParser })
    ).rejects.toThrow(new EmptyResultError("No content was extracted from the PDF"));
    expect(await fsp.readFile(outputPath, "utf8")).toBe("old");
  });

  it("does not create an output file when nothing was extracted", async () => {
    const inputPath = await writeDummyPdf(dir);
    const { createParser } = fakeParser([]);

    await expect(
      convertPdf({ inputPath, format: "text" }, { config, createParser })
    ).rejects.toBeInstanceOf(EmptyResultError);
    expect(await fsp.readdir(dir)).toEqual(["report.pdf"]);
  });

  it("wraps service errors in ExternalServiceError", async () => {
    const inputPath = await writeDummyPdf(dir);
    const cause = new LlamaParseError({ message: "Invalid API key", code: "UNAUTHORIZED", status: 401 });
    const { createParser } = fakeParser(cause);

    const err = await convertPdf({ inputPath }, { config, createParser }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(ExternalServiceError);
    if (err instanceof ExternalServiceError) {
      expect(err.code).toBe("EXTERNAL_SERVICE");
      expect(err.cause).toBe(cause);
      expect(err.message).toBe("LlamaParse request failed: Invalid API key");
    }
  });

  it("lets other errors through untouched", async () => {
    const inputPath = await writeDummyPdf(dir);
    const boom = new TypeError("boom");
    const { createParser } = fakeParser(boom);

    await expect(convertPdf({ inputPath }, { config, createParser })).rejects.toBe(boom);
  });

  it("logs start and success", async () => {
    const inputPath = await writeDummyPdf(dir);
    const logger = new RecordingLogger();
    const { createParser } = fakeParser([doc("Hello")]);

    await convertPdf({ inputPath, format: "text" }, { config, createParser, logger });

    expect(logger.messages("info")).toEqual([
      `Processing PDF file: ${inputPath}`,
      `Successfully converted PDF to TEXT: ${path.join(dir, "report.txt")}`,
    ]);
    expect(logger.messages("error")).toEqual([]);
  });

  it("logs failures before rethrowing", async () => {
    const inputPath = path.join(dir, "missing.pdf");
    const logger = new RecordingLogger();

    await expect(convertPdf({ inputPath }, { config, logger })).rejects.toBeInstanceOf(
      NotFoundError
    );
    expect(logger.messages("error")).toEqual([
      `Failed to convert PDF: PDF file not found: ${inputPath}`,
    ]);
  });
});

describe("convertPdfToMarkdown", () => {
  it("always requests markdown", async () => {
    const dir = await makeTmpDir();
    try {
      const inputPath = await writeDummyPdf(dir);
      const { createParser } = fakeParser([doc("# Title")]);

      const result = await convertPdfToMarkdown({ inputPath }, { config, createParser });

      expect(result.outputPath).toBe(path.join(dir, "report.md"));
      expect(createParser).toHaveBeenCalledWith(
        expect.objectContaining({ resultType: "markdown" })
      );
    } finally {
      await fsp.rm(dir, { recursive: true, force: true });
    }
  });
});
