import { hashAccessKeyId, recordAuditEvent } from "./audit/index.js";
import type { AppConfig, ObjectAcl } from "./config.js";
import type { CredentialResolver } from "./credentials.js";
import {
  BackendUnavailableError,
  FileTooLargeError,
  SigningError,
  isUploadServiceError,
  toErrorMessage,
} from "./errors.js";
import { generateStorageKey, type KeyGeneratorOptions } from "./keys.js";
import { sentryCountMetric, sentryDistributionMetric, sentryLog } from "./observability.js";
import { retryTransient } from "./retry.js";
import { inferContentType, type StorageBackend } from "./s3.js";
import type {
  BatchUploadResult,
  PresignedUpload,
  ResolvedCredentials,
  StorageKey,
  UploadRequest,
} from "./types.js";

export type UploadIssuerOptions = {
  keys: KeyGeneratorOptions;
  expiresInSeconds: number;
  maxFileSizeBytes: number;
  acl?: ObjectAcl;
  retryDelayMs?: number;
  now?: () => Date;
  randomId?: () => string;
};

export type IssueContext = {
  clientIp?: string;
};

type CredentialSource = Pick<CredentialResolver, "resolve" | "invalidate">;

export const issuerOptionsFromConfig = (config: AppConfig): UploadIssuerOptions => ({
  keys: {
    prefix: config.UPLOAD_KEY_PREFIX,
    customPathRoot: config.UPLOAD_CUSTOM_PATH_ROOT,
    maxFilenameBytes: config.UPLOAD_MAX_FILENAME_BYTES,
    allowedExtensions: config.UPLOAD_ALLOWED_EXTENSIONS,
  },
  expiresInSeconds: config.UPLOAD_URL_EXPIRES_SECONDS,
  maxFileSizeBytes: Math.floor(config.UPLOAD_MAX_FILE_SIZE_MB * 1024 * 1024),
  acl: config.UPLOAD_OBJECT_ACL,
});

export class UploadUrlIssuer {
  private readonly credentials: CredentialSource;
  private readonly backend: StorageBackend;
  private readonly options: UploadIssuerOptions;

  constructor(credentials: CredentialSource, backend: StorageBackend, options: UploadIssuerOptions) {
    this.credentials = credentials;
    this.backend = backend;
    this.options = options;
  }

  async requestUploadUrl(request: UploadRequest, context: IssueContext = {}): Promise<PresignedUpload> {
    const startedAt = Date.now();
    let storageKey: StorageKey | undefined;
    let resolved: ResolvedCredentials | undefined;

    try {
      this.assertSizeAllowed(request.contentLength);

      // Malformed requests fail here, before any secret or storage call.
      storageKey = generateStorageKey(request, this.options.keys, {
        now: this.options.now,
        randomId: this.options.randomId,
      });

      resolved = await this.credentials.resolve();
      const upload = await this.presign(resolved, storageKey, request);

      void recordAuditEvent({
        operation: "upload.presign",
        bucket: upload.bucket,
        key: storageKey.generatedKey,
        contentType: upload.headers["Content-Type"],
        credentialProvider: resolved.provider,
        accessKeyHash: hashAccessKeyId(resolved.bundle.accessKeyId),
        clientIp: context.clientIp,
        result: "success",
        durationMs: Date.now() - startedAt,
      });
      sentryCountMetric("upload.presign", 1, { status: "success", provider: resolved.provider });
      sentryDistributionMetric("upload.presign.duration", Date.now() - startedAt, "millisecond");

      return upload;
    } catch (error) {
      if (error instanceof SigningError) {
        // Rejected credentials are likely rotated; re-read the secret stores next time.
        this.credentials.invalidate();
      }

      const errorCode = isUploadServiceError(error) ? error.code : "InternalError";

      void recordAuditEvent({
        operation: "upload.presign",
        bucket: resolved?.bundle.bucketName,
        key: storageKey?.generatedKey,
        credentialProvider: resolved?.provider,
        accessKeyHash: hashAccessKeyId(resolved?.bundle.accessKeyId),
        clientIp: context.clientIp,
        result: "failure",
        errorCode,
        error: toErrorMessage(error),
        durationMs: Date.now() - startedAt,
      });
      sentryCountMetric("upload.presign", 1, { status: "failure", code: errorCode });

      throw error;
    }
  }

  /** Issues one URL per request concurrently; each item succeeds or fails on its own. */
  async requestUploadUrls(
    requests: UploadRequest[],
    context: IssueContext = {},
  ): Promise<BatchUploadResult[]> {
    return Promise.all(
      requests.map(async (request): Promise<BatchUploadResult> => {
        try {
          const upload = await this.requestUploadUrl(request, context);
          return { ok: true, filename: request.originalFilename, upload };
        } catch (error) {
          if (!isUploadServiceError(error)) {
            throw error;
          }

          return {
            ok: false,
            filename: request.originalFilename,
            code: error.code,
            error: error.publicMessage,
          };
        }
      }),
    );
  }

  private assertSizeAllowed(contentLength?: number): void {
    if (contentLength !== undefined && contentLength > this.options.maxFileSizeBytes) {
      throw new FileTooLargeError(contentLength, this.options.maxFileSizeBytes);
    }
  }

  private async presign(
    resolved: ResolvedCredentials,
    storageKey: StorageKey,
    request: UploadRequest,
  ): Promise<PresignedUpload> {
    const { bundle } = resolved;
    const contentType = request.contentType || inferContentType(request.originalFilename);

    const signed = await retryTransient(
      () =>
        this.backend.createPresignedPutUrl({
          credentials: bundle,
          bucket: bundle.bucketName,
          key: storageKey.generatedKey,
          expiresInSeconds: this.options.expiresInSeconds,
          contentType,
          contentLength: request.contentLength,
          acl: this.options.acl,
        }),
      {
        minDelayMs: this.options.retryDelayMs,
        isTransient: (error) => error instanceof BackendUnavailableError,
        onRetry: (error, attempt) => {
          sentryLog("warn", "Retrying presigned URL issuance", {
            bucket: bundle.bucketName,
            attempt,
            error: toErrorMessage(error),
          });
        },
      },
    );

    return {
      url: signed.url,
      method: "PUT",
      expiresAt: signed.expiresAt,
      storageKey,
      bucket: bundle.bucketName,
      headers: signed.headers,
    };
  }
}
