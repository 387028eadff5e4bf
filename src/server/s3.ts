import { HeadBucketCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { lookup as lookupMimeType } from "mime-types";
import type { ObjectAcl } from "./config.js";
import {
  BackendUnavailableError,
  SigningError,
  toErrorMessage,
  toErrorName,
  toHttpStatusCode,
} from "./errors.js";
import { sentryDistributionMetric, sentryLog } from "./observability.js";
import { isTransientError } from "./retry.js";
import type { CredentialBundle } from "./types.js";

export type PresignPutParams = {
  credentials: CredentialBundle;
  bucket: string;
  key: string;
  expiresInSeconds: number;
  contentType: string;
  contentLength?: number;
  acl?: ObjectAcl;
};

export type PresignedPutUrl = {
  url: string;
  expiresAt: Date;
  headers: Record<string, string>;
};

/** Storage side of the issuer: mints a write URL for exactly one object key. */
export interface StorageBackend {
  createPresignedPutUrl(params: PresignPutParams): Promise<PresignedPutUrl>;
}

export type S3StorageBackendOptions = {
  endpoint?: string;
  forcePathStyle: boolean;
  timeoutMs: number;
  verifyCredentials: boolean;
  now?: () => Date;
};

const trackS3Latency = async <T>(
  operation: string,
  run: () => Promise<T>,
  attributes?: Record<string, unknown>,
): Promise<T> => {
  const startedAt = Date.now();

  try {
    const result = await run();
    sentryDistributionMetric(`s3.${operation}.latency`, Date.now() - startedAt, "millisecond", {
      ...attributes,
      status: "success",
    });
    return result;
  } catch (error) {
    sentryDistributionMetric(`s3.${operation}.latency`, Date.now() - startedAt, "millisecond", {
      ...attributes,
      status: "failure",
    });
    throw error;
  }
};

export const inferContentType = (key: string): string => {
  return lookupMimeType(key) || "application/octet-stream";
};

const describeRejection = (error: unknown): string => {
  const name = toErrorName(error) ?? "UnknownError";
  const statusCode = toHttpStatusCode(error);

  if (name === "NotFound" || name === "NoSuchBucket" || statusCode === 404) {
    return "bucket not found";
  }

  if (statusCode === 301 || name === "PermanentRedirect") {
    return "bucket is in a different region";
  }

  return statusCode ? `${name} (HTTP ${statusCode})` : name;
};

const sameSigningIdentity = (a: CredentialBundle, b: CredentialBundle): boolean =>
  a.accessKeyId === b.accessKeyId &&
  a.secretAccessKey === b.secretAccessKey &&
  a.region === b.region &&
  a.bucketName === b.bucketName;

type ClientSlot = {
  credentials: CredentialBundle;
  client: S3Client;
  verification?: Promise<void>;
};

export class S3StorageBackend implements StorageBackend {
  private readonly options: S3StorageBackendOptions;
  // Only the current bundle gets a client; a new bundle closes the previous one.
  private slot: ClientSlot | null = null;

  constructor(options: S3StorageBackendOptions) {
    this.options = options;
  }

  async createPresignedPutUrl(params: PresignPutParams): Promise<PresignedPutUrl> {
    const slot = this.getSlot(params.credentials);
    const client = slot.client;

    if (this.options.verifyCredentials) {
      await this.verifyBucketAccess(slot, params.bucket);
    }

    const signedAt = (this.options.now ?? (() => new Date()))();
    const signableHeaders = new Set(["content-type"]);
    const headers: Record<string, string> = { "Content-Type": params.contentType };

    if (params.contentLength !== undefined) {
      signableHeaders.add("content-length");
      headers["Content-Length"] = `${params.contentLength}`;
    }

    const command = new PutObjectCommand({
      Bucket: params.bucket,
      Key: params.key,
      ContentType: params.contentType,
      ContentLength: params.contentLength,
      ACL: params.acl,
    });

    let url: string;

    try {
      url = await trackS3Latency(
        "presign_put_object",
        () =>
          getSignedUrl(client, command, {
            expiresIn: params.expiresInSeconds,
            signingDate: signedAt,
            signableHeaders,
          }),
        { bucket: params.bucket },
      );
    } catch (error) {
      throw new SigningError(toErrorMessage(error), { cause: error });
    }

    return {
      url,
      expiresAt: new Date(signedAt.getTime() + params.expiresInSeconds * 1000),
      headers,
    };
  }

  destroy(): void {
    this.slot?.client.destroy();
    this.slot = null;
  }

  private getSlot(credentials: CredentialBundle): ClientSlot {
    if (this.slot && sameSigningIdentity(this.slot.credentials, credentials)) {
      return this.slot;
    }

    this.destroy();

    const client = new S3Client({
      endpoint: this.options.endpoint,
      region: credentials.region,
      forcePathStyle: this.options.forcePathStyle,
      credentials: {
        accessKeyId: credentials.accessKeyId,
        secretAccessKey: credentials.secretAccessKey,
      },
      // the issuer retries transient failures itself
      maxAttempts: 1,
    });

    this.slot = { credentials, client };
    return this.slot;
  }

  /**
   * Presigning is local, so a missing bucket or a wrong region would only
   * surface when the client uploads. A HeadBucket per signing identity catches
   * those up front. A put-only key cannot run HeadBucket (it needs
   * s3:ListBucket), so a bare 403 leaves the bundle unverified instead of
   * rejecting it.
   */
  private verifyBucketAccess(slot: ClientSlot, bucket: string): Promise<void> {
    if (slot.verification) {
      return slot.verification;
    }

    const pending = this.headBucket(slot.client, bucket);
    slot.verification = pending;
    void pending.catch(() => {
      if (slot.verification === pending) {
        slot.verification = undefined;
      }
    });

    return pending;
  }

  private async headBucket(client: S3Client, bucket: string): Promise<void> {
    try {
      await trackS3Latency(
        "head_bucket",
        () =>
          client.send(new HeadBucketCommand({ Bucket: bucket }), {
            abortSignal: AbortSignal.timeout(this.options.timeoutMs),
          }),
        { bucket },
      );
    } catch (error) {
      if (isTransientError(error)) {
        throw new BackendUnavailableError(describeRejection(error), { cause: error });
      }

      if (toHttpStatusCode(error) === 403) {
        sentryLog("warn", "Bucket access could not be verified with the upload credentials", {
          bucket,
          reason: describeRejection(error),
        });
        return;
      }

      throw new SigningError(describeRejection(error), { cause: error });
    }
  }
}
