import { fetch, type Response as UndiciResponse } from "undici";
import type { BodyInit } from "undici";
import { FormData } from "formdata-node";
import { fileFromPath } from "formdata-node/file-from-path";
import path from "node:path";
import { z } from "zod";

import { LlamaParseError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type {
  DocumentParser,
  LlamaParseClientOptions,
  LoadDataOptions,
  OutputFormat,
  ParsedDocument,
} from "./types.js";
import { getBackoffMs, isRetryAbleStatus, sleep } from "./utils.js";

/* -------------------------------- Constants ------------------------------- */

export const DEFAULT_BASE_URL = "https://api.cloud.llamaindex.ai";
const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_CHECK_INTERVAL_MS = 1_000;
const DEFAULT_MAX_TIMEOUT_MS = 2_000_000;

/* --------------------------------- Schemas -------------------------------- */

const uploadResponseSchema = z.object({
  id: z.string().min(1),
  status: z.string().optional(),
});

const jobResponseSchema = z.object({
  status: z.string(),
  error_code: z.string().nullish(),
  error_message: z.string().nullish(),
});

const resultSchemas = {
  markdown: z.object({ markdown: z.string() }),
  text: z.object({ text: z.string() }),
} as const;

/* ---------------------------------- Utils --------------------------------- */

function normalizeBaseUrl(baseUrl?: string): string {
  const url = (baseUrl || DEFAULT_BASE_URL).trim();
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

function mapStatusToCode(status: number): LlamaParseError["code"] {
  const map: Record<number, LlamaParseError["code"]> = {
    401: "UNAUTHORIZED",
    403: "FORBIDDEN",
    404: "NOT_FOUND",
    429: "RATE_LIMITED",
    413: "QUOTA_EXCEEDED",
  };

  if (map[status]) return map[status];
  if (status >= 400 && status < 500) return "INVALID_REQUEST";
  if (status >= 500) return "SERVER_ERROR";
  return "UNKNOWN";
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function safeReadJson(res: UndiciResponse): Promise<JsonObject | null> {
  const ct = res.headers.get("content-type") ?? "";
  if (!ct.includes("application/json")) return null;

  try {
    const body: unknown = await res.json();
    return isJsonObject(body) ? body : null;
  } catch {
    return null;
  }
}

function getRequestId(res: UndiciResponse): string | undefined {
  return (
    res.headers.get("x-request-id") ?? res.headers.get("cf-ray") ?? undefined
  );
}

/**
 * Merge multiple AbortSignals into one.
 * Returns the merged signal and a cleanup function to avoid listener leaks.
 */
function mergeAbortSignals(...signals: (AbortSignal | undefined)[]): {
  signal?: AbortSignal;
  cleanup: () => void;
} {
  const active = signals.filter((s): s is AbortSignal => s != null);

  if (active.length === 0) {
    return { signal: undefined, cleanup: () => {} };
  }

  if (active.length === 1) {
    return { signal: active[0], cleanup: () => {} };
  }

  const aborted = active.find((s) => s.aborted);
  if (aborted) {
    return { signal: aborted, cleanup: () => {} };
  }

  const controller = new AbortController();
  const onAbort = () => controller.abort();

  active.forEach((s) => s.addEventListener("abort", onAbort));

  return {
    signal: controller.signal,
    cleanup: () => {
      active.forEach((s) => s.removeEventListener("abort", onAbort));
    },
  };
}

function asBodyInit(body: unknown): BodyInit {
  return body as BodyInit;
}

type RequestSpec = {
  method: "GET" | "POST";
  path: string;
  body?: () => Promise<FormData>;
  jobId?: string;
};

/* --------------------------------- Client --------------------------------- */

/**
 * Client for the LlamaParse document parsing API.
 *
 * A parse is a three step job: the file is uploaded, the job is polled
 * until it settles, then the result is fetched in the requested format.
 *
 * @example
 * ```typescript
 * const parser = new LlamaParseClient({
 *   apiKey: process.env.LLAMA_CLOUD_API_KEY ?? "",
 *   resultType: "markdown",
 *   premiumMode: true,
 * });
 *
 * const [doc] = await parser.loadData("./report.pdf");
 * console.log(doc.text);
 * ```
 * Authentication uses a bearer token.
 */
export class LlamaParseClient implements DocumentParser {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly resultType: OutputFormat;
  private readonly language: string;
  private readonly premiumMode: boolean;
  private readonly continuousMode: boolean;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly checkIntervalMs: number;
  private readonly maxTimeoutMs: number;
  private readonly verbose: boolean;
  private readonly logger: Logger;
  private readonly userAgent: string;

  constructor(opts: LlamaParseClientOptions) {
    if (!opts?.apiKey?.trim()) {
      throw new LlamaParseError({
        message: "LlamaParse: apiKey is required",
        code: "INVALID_REQUEST",
      });
    }

    this.apiKey = opts.apiKey.trim();
    this.baseUrl = normalizeBaseUrl(opts.baseUrl);
    this.resultType = opts.resultType ?? "markdown";
    this.language = opts.language ?? "en";
    this.premiumMode = opts.premiumMode ?? false;
    this.continuousMode = opts.continuousMode ?? false;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(0, opts.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.checkIntervalMs = opts.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
    this.maxTimeoutMs = opts.maxTimeoutMs ?? DEFAULT_MAX_TIMEOUT_MS;
    this.verbose = opts.verbose ?? false;
    this.logger = opts.logger ?? silentLogger;
    this.userAgent = opts.userAgent ?? "pdf2x-node";
  }

  /**
   * Parse a file and return its documents. The list holds a single
   * document for the whole file.
   */
  async loadData(
    filePath: string,
    options: LoadDataOptions = {}
  ): Promise<ParsedDocument[]> {
    const jobId = await this.createJob(filePath, options.signal);

    if (this.verbose) {
      this.logger.info(`Started parsing the file under job_id ${jobId}`);
    }

    await this.waitForJob(jobId, options.signal);
    const text = await this.fetchResult(jobId, options.signal);

    return [{ text, metadata: { jobId, resultType: this.resultType } }];
  }

  /* ------------------------------ Internals ------------------------------ */

  private async createJob(
    filePath: string,
    signal?: AbortSignal
  ): Promise<string> {
    const body = await this.request(
      {
        method: "POST",
        path: "/api/parsing/upload",
        body: () => this.buildFormData(filePath),
      },
      signal
    );

    return this.parseJson(body, uploadResponseSchema).id;
  }

  private async waitForJob(jobId: string, signal?: AbortSignal): Promise<void> {
    const startedAt = Date.now();

    for (;;) {
      const body = await this.request(
        {
          method: "GET",
          path: `/api/parsing/job/${encodeURIComponent(jobId)}`,
          jobId,
        },
        signal
      );
      const job = this.parseJson(body, jobResponseSchema, jobId);

      switch (job.status) {
        case "SUCCESS":
        case "PARTIAL_SUCCESS":
          return;
        case "ERROR":
        case "CANCELED":
        case "CANCELLED":
          throw new LlamaParseError({
            message: `Parsing job ${jobId} ended with status ${job.status}${
              job.error_message ? `: ${job.error_message}` : ""
            }`,
            code: "JOB_FAILED",
            jobId,
            details: job,
          });
      }

      if (Date.now() - startedAt >= this.maxTimeoutMs) {
        throw new LlamaParseError({
          message: `Parsing job ${jobId} did not finish within ${this.maxTimeoutMs}ms`,
          code: "TIMEOUT",
          jobId,
        });
      }

      this.logger.debug(`Job ${jobId} is ${job.status}, checking again`);
      await this.pause(this.checkIntervalMs, signal, jobId);
    }
  }

  private async fetchResult(
    jobId: string,
    signal?: AbortSignal
  ): Promise<string> {
    const body = await this.request(
      {
        method: "GET",
        path: `/api/parsing/job/${encodeURIComponent(jobId)}/result/${this.resultType}`,
        jobId,
      },
      signal
    );

    // JSON results are handed back as the service sent them.
    if (this.resultType === "json") return body;

    if (this.resultType === "markdown") {
      return this.parseJson(body, resultSchemas.markdown, jobId).markdown;
    }

    return this.parseJson(body, resultSchemas.text, jobId).text;
  }

  /**
   * Send one request, retrying transient failures. Resolves with the
   * response body text of a 2xx response.
   */
  private async request(spec: RequestSpec, signal?: AbortSignal): Promise<string> {
    let lastError: LlamaParseError | undefined;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.send(spec, signal);
      } catch (err) {
        // A caller abort is final, whatever the request was doing.
        if (signal?.aborted) throw this.abortedError(spec.jobId);

        const normalized = this.normalizeError(err, spec.jobId);
        lastError = normalized;

        if (attempt < this.maxRetries && this.isRetryAble(normalized)) {
          this.logger.debug(
            `${spec.method} ${spec.path} failed (${normalized.code}), retrying`
          );
          await this.pause(getBackoffMs(attempt), signal, spec.jobId);
          continue;
        }

        throw normalized;
      }
    }

    throw (
      lastError ??
      new LlamaParseError({
        message: "Unexpected request failure",
        code: "UNKNOWN",
      })
    );
  }

  private async send(spec: RequestSpec, signal?: AbortSignal): Promise<string> {
    const body = spec.body ? await spec.body() : undefined;

    const timeoutCtrl = new AbortController();
    const timeoutId = setTimeout(() => timeoutCtrl.abort(), this.timeoutMs);

    const merged = mergeAbortSignals(signal, timeoutCtrl.signal);

    try {
      const res = await fetch(`${this.baseUrl}${spec.path}`, {
        method: spec.method,
        body: body ? asBodyInit(body) : undefined,
        headers: {
          authorization: `Bearer ${this.apiKey}`,
          accept: "application/json",
          "user-agent": this.userAgent,
        },
        signal: merged.signal,
      });

      return await this.handleResponse(res, spec);
    } finally {
      clearTimeout(timeoutId);
      merged.cleanup();
    }
  }

  private async buildFormData(filePath: string): Promise<FormData> {
    const form = new FormData();
    const file = await fileFromPath(filePath, path.basename(filePath), {
      type: "application/pdf",
    });

    form.set("file", file);
    form.set("language", this.language);

    if (this.premiumMode) {
      form.set("premium_mode", "true");
    }

    if (this.continuousMode) {
      form.set("continuous_mode", "true");
    }

    return form;
  }

  private async handleResponse(
    res: UndiciResponse,
    spec: RequestSpec
  ): Promise<string> {
    const requestId = getRequestId(res);

    if (!res.ok) {
      const json = await safeReadJson(res);
      const message =
        typeof json?.detail === "string"
          ? json.detail
          : typeof json?.message === "string"
          ? json.message
          : `Request failed with status ${res.status}`;

      throw new LlamaParseError({
        message,
        code: mapStatusToCode(res.status),
        status: res.status,
        requestId,
        jobId: spec.jobId,
        details: json ?? undefined,
      });
    }

    return res.text();
  }

  private parseJson<T>(
    body: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    jobId?: string
  ): T {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new LlamaParseError({
        message: "Response body is not valid JSON",
        code: "BAD_RESPONSE",
        jobId,
        details: body,
      });
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      throw new LlamaParseError({
        message: `Unexpected response shape: ${result.error.issues
          .map((i) => `${i.path.join(".") || "body"} ${i.message}`)
          .join("; ")}`,
        code: "BAD_RESPONSE",
        jobId,
        details: json,
      });
    }

    return result.data;
  }

  private async pause(
    ms: number,
    signal: AbortSignal | undefined,
    jobId?: string
  ): Promise<void> {
    try {
      await sleep(ms, signal);
    } catch {
      throw this.abortedError(jobId);
    }
  }

  private abortedError(jobId?: string): LlamaParseError {
    return new LlamaParseError({
      message: "Request aborted",
      code: "ABORTED",
      jobId,
    });
  }

  private normalizeError(err: unknown, jobId?: string): LlamaParseError {
    if (err instanceof LlamaParseError) return err;

    if (err instanceof Error && err.name === "AbortError") {
      return new LlamaParseError({
        message: "Request timed out",
        code: "TIMEOUT",
        jobId,
      });
    }

    if (err instanceof Error) {
      return new LlamaParseError({
        message: err.message,
        code: "NETWORK_ERROR",
        jobId,
        details: { name: err.name },
      });
    }

    return new LlamaParseError({
      message: "Unknown error",
      code: "UNKNOWN",
      jobId,
      details: err,
    });
  }

  private isRetryAble(error: LlamaParseError): boolean {
    if (error.code === "TIMEOUT" || error.code === "NETWORK_ERROR") {
      return true;
    }

    if (error.status && isRetryAbleStatus(error.status)) {
      return true;
    }

    return false;
  }
}
