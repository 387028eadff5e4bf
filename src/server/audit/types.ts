export type AuditResult = "success" | "failure";

export type AuditEvent = {
  timestamp?: string;
  operation: string;
  bucket?: string;
  key?: string;
  contentType?: string;
  credentialProvider?: string;
  accessKeyHash?: string;
  clientIp?: string;
  result: AuditResult;
  errorCode?: string;
  error?: string;
  durationMs?: number;
};

export type AuditSink = {
  write(event: AuditEvent): Promise<void>;
  shutdown(): Promise<void>;
};
