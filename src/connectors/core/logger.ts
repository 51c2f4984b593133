import type { Logger } from "./types.js";

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private progressOpen = false;

  constructor(scope: string) {
    this.prefix = `[${scope}]`;
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.closeProgress();
    console.log(this.format(msg, data));
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.closeProgress();
    console.warn(this.format(`⚠ ${msg}`, data));
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.closeProgress();
    console.error(this.format(`✗ ${msg}`, data));
  }

  progress(current: number, total: number, label: string): void {
    const pct = total > 0 ? Math.round((current / total) * 100) : 0;
    process.stdout.write(
      `\r${this.prefix} ${label}: ${current.toLocaleString("en-US")}/${total.toLocaleString("en-US")} (${pct}%)`,
    );
    this.progressOpen = current < total;
    if (!this.progressOpen) process.stdout.write("\n");
  }

  private format(msg: string, data?: Record<string, unknown>): string {
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    return `${this.prefix} [${timestamp(new Date())}] ${msg}${extra}`;
  }

  private closeProgress(): void {
    if (this.progressOpen) {
      process.stdout.write("\n");
      this.progressOpen = false;
    }
  }
}

export function createLogger(scope: string): Logger {
  return new ConsoleLogger(scope);
}
