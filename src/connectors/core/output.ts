import * as fs from "node:fs";
import * as path from "node:path";
import type { OutputWriter } from "./types.js";

// Spreadsheet and database importers read the encoding from the BOM
const BOM = "\uFEFF";

/** Quote a field only when it holds the delimiter, a quote or a line break. */
export function formatField(value: string, delimiter: string): string {
  if (
    value.includes(delimiter) ||
    value.includes('"') ||
    value.includes("\n") ||
    value.includes("\r")
  ) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatDelimited(
  columns: readonly string[],
  rows: ReadonlyArray<Record<string, string>>,
  delimiter: string,
): string {
  const lines = [columns.map((c) => formatField(c, delimiter)).join(delimiter)];
  for (const row of rows) {
    lines.push(
      columns.map((c) => formatField(row[c] ?? "", delimiter)).join(delimiter),
    );
  }
  return `${BOM}${lines.join("\n")}\n`;
}

export class FileOutputWriter implements OutputWriter {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  private resolve(relativePath: string): string {
    return path.join(this.baseDir, relativePath);
  }

  private atomicWrite(filePath: string, content: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}.tmp`;
    fs.writeFileSync(tmp, content);
    fs.renameSync(tmp, filePath);
  }

  async writeJson(relativePath: string, data: unknown): Promise<string> {
    const filePath = this.resolve(relativePath);
    this.atomicWrite(filePath, `${BOM}${JSON.stringify(data, null, 2)}\n`);
    return filePath;
  }

  async writeDelimited(
    relativePath: string,
    columns: readonly string[],
    rows: ReadonlyArray<Record<string, string>>,
    delimiter: string,
  ): Promise<string> {
    const filePath = this.resolve(relativePath);
    this.atomicWrite(filePath, formatDelimited(columns, rows, delimiter));
    return filePath;
  }

  async remove(relativePath: string): Promise<void> {
    fs.rmSync(this.resolve(relativePath), { force: true });
  }
}

export function createOutputWriter(baseDir: string): OutputWriter {
  return new FileOutputWriter(baseDir);
}
