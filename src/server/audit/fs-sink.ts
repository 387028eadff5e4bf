import { promises as fs } from "node:fs";
import path from "node:path";
import type { AuditEvent, AuditSink } from "./types.js";

const CSV_COLUMNS = [
  "timestamp",
  "operation",
  "bucket",
  "key",
  "contentType",
  "credentialProvider",
  "accessKeyHash",
  "clientIp",
  "result",
  "errorCode",
  "error",
  "durationMs",
] as const satisfies readonly (keyof AuditEvent)[];

const FILE_PATTERN = /^upload-audit_(\d{4})(\d{2})(\d{2})\.csv$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export const toCsvValue = (value: unknown): string => {
  if (value === undefined || value === null) {
    return "";
  }

  const text = String(value);

  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }

  return text;
};

export const toCsvLine = (event: AuditEvent): string => {
  return CSV_COLUMNS.map((column) => toCsvValue(event[column])).join(",");
};

const formatDateKey = (date: Date): string => {
  return date.toISOString().slice(0, 10).replace(/-/g, "");
};

const parseFileDate = (fileName: string): Date | null => {
  const match = FILE_PATTERN.exec(fileName);

  if (!match) {
    return null;
  }

  const [, year, month, day] = match;
  return new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
};

/** One CSV file per UTC day; files older than the retention window are removed. */
export class FilesystemAuditSink implements AuditSink {
  private readonly dir: string;
  private readonly retentionDays: number;
  private lastCleanupKey: string | null = null;

  constructor(dir: string, retentionDays: number) {
    this.dir = dir;
    this.retentionDays = retentionDays;
  }

  async write(event: AuditEvent): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });

    const dateKey = formatDateKey(event.timestamp ? new Date(event.timestamp) : new Date());
    const filePath = path.join(this.dir, `upload-audit_${dateKey}.csv`);

    await this.append(filePath, toCsvLine(event));
    await this.removeExpired(dateKey);
  }

  async shutdown(): Promise<void> {
    await this.removeExpired(formatDateKey(new Date()));
  }

  private async append(filePath: string, line: string): Promise<void> {
    const handle = await fs.open(filePath, "a+");

    try {
      const stats = await handle.stat();
      const header = stats.size === 0 ? `${CSV_COLUMNS.join(",")}\n` : "";
      await handle.writeFile(`${header}${line}\n`);
    } finally {
      await handle.close();
    }
  }

  private async removeExpired(dateKey: string): Promise<void> {
    if (this.lastCleanupKey === dateKey) {
      return;
    }

    this.lastCleanupKey = dateKey;

    const cutoffMs = Date.now() - this.retentionDays * DAY_MS;
    const entries = await fs.readdir(this.dir).catch((): string[] => []);

    const expired = entries.filter((entry) => {
      const fileDate = parseFileDate(entry);
      return fileDate !== null && fileDate.getTime() < cutoffMs;
    });

    // a concurrent writer may already have removed the file
    await Promise.allSettled(expired.map((entry) => fs.unlink(path.join(this.dir, entry))));
  }
}
