export type CredentialBundle = Readonly<{
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  bucketName: string;
}>;

export type CredentialSource = "structured" | "fields";

export type ResolvedCredentials = Readonly<{
  bundle: CredentialBundle;
  provider: string;
  source: CredentialSource;
  resolvedAt: Date;
}>;

export type UploadRequest = {
  originalFilename: string;
  customPath?: string;
  contentType?: string;
  contentLength?: number;
};

export type StorageKey = {
  generatedKey: string;
};

export type PresignedUpload = {
  url: string;
  method: "PUT";
  expiresAt: Date;
  storageKey: StorageKey;
  bucket: string;
  headers: Record<string, string>;
};

export type BatchUploadResult =
  | { ok: true; filename: string; upload: PresignedUpload }
  | { ok: false; filename: string; code: string; error: string };

export type ApiErrorShape = {
  error: string;
  code?: string;
  details?: string;
};
