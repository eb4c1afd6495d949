import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { Logger } from "../src/index.js";

export type LogRecord = { level: keyof Logger; message: string };

export class RecordingLogger implements Logger {
  readonly records: LogRecord[] = [];

  debug(message: string): void {
    this.records.push({ level: "debug", message });
  }

  info(message: string): void {
    this.records.push({ level: "info", message });
  }

  warn(message: string): void {
    this.records.push({ level: "warn", message });
  }

  error(message: string): void {
    this.records.push({ level: "error", message });
  }

  messages(level: keyof Logger): string[] {
    return this.records.filter((r) => r.level === level).map((r) => r.message);
  }
}

export async function makeTmpDir(): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), "pdf2x-test-"));
}

export async function writeDummyPdf(dir: string, name = "report.pdf"): Promise<string> {
  const p = path.join(dir, name);
  await fsp.writeFile(p, Buffer.from("%PDF-1.4 dummy"));
  return p;
}
