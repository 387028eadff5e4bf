import { createHash } from "node:crypto";
import type { AppConfig } from "../config.js";
import { toErrorMessage } from "../errors.js";
import { FilesystemAuditSink } from "./fs-sink.js";
import type { AuditEvent, AuditSink } from "./types.js";

const MAX_ERROR_LENGTH = 1000;

class NoopAuditSink implements AuditSink {
  async write(): Promise<void> {
    return;
  }

  async shutdown(): Promise<void> {
    return;
  }
}

let auditSink: AuditSink = new NoopAuditSink();

const normalizeEvent = (event: AuditEvent): AuditEvent => {
  return {
    ...event,
    timestamp: event.timestamp || new Date().toISOString(),
    error: event.error ? event.error.slice(0, MAX_ERROR_LENGTH) : undefined,
  };
};

export const initializeAuditLogger = (
  config: Pick<AppConfig, "AUDIT_LOG_SINK" | "AUDIT_LOG_DIR" | "AUDIT_LOG_RETENTION_DAYS">,
): AuditSink => {
  auditSink =
    config.AUDIT_LOG_SINK === "filesystem"
      ? new FilesystemAuditSink(config.AUDIT_LOG_DIR, config.AUDIT_LOG_RETENTION_DAYS)
      : new NoopAuditSink();

  return auditSink;
};

export const shutdownAuditLogger = async (): Promise<void> => {
  await auditSink.shutdown();
};

/** Access key ids are recorded as digests so the trail never holds credentials. */
export const hashAccessKeyId = (accessKeyId?: string): string | undefined => {
  if (!accessKeyId) {
    return undefined;
  }

  return createHash("sha256").update(accessKeyId).digest("hex");
};

export const recordAuditEvent = async (event: AuditEvent): Promise<void> => {
  try {
    await auditSink.write(normalizeEvent(event));
  } catch (error) {
    console.error("Failed to write audit event", toErrorMessage(error));
  }
};

export type { AuditEvent, AuditResult, AuditSink } from "./types.js";
