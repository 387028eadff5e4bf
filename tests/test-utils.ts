import { vi } from "vitest";
import { SecretNotFoundError, SecretProviderUnavailableError } from "../src/server/errors.js";
import type { PresignPutParams, PresignedPutUrl, StorageBackend } from "../src/server/s3.js";
import type { SecretProvider } from "../src/server/secrets/index.js";
import type { CredentialBundle } from "../src/server/types.js";
import type { SecretNames } from "../src/server/credentials.js";

export const TEST_SECRET_NAMES: SecretNames = {
  structured: "aws_credentials",
  fields: {
    access_key_id: "aws_access_key_id",
    secret_access_key: "aws_secret_access_key",
    region: "aws_region",
    bucket_name: "s3_bucket_name",
  },
};

export const TEST_BUNDLE: CredentialBundle = {
  accessKeyId: "test-access-key",
  secretAccessKey: "test-secret",
  region: "us-east-1",
  bucketName: "test-bucket",
};

export const TEST_FIELD_SECRETS: Record<string, string> = {
  aws_access_key_id: TEST_BUNDLE.accessKeyId,
  aws_secret_access_key: TEST_BUNDLE.secretAccessKey,
  aws_region: TEST_BUNDLE.region,
  s3_bucket_name: TEST_BUNDLE.bucketName,
};

/**
 * In-process secret store. `lookups` records every requested name.
 */
export class InMemorySecretProvider implements SecretProvider {
  readonly name: string;
  readonly lookups: string[] = [];
  private values: Record<string, string>;

  constructor(name: string, values: Record<string, string>) {
    this.name = name;
    this.values = { ...values };
  }

  set(values: Record<string, string>): void {
    this.values = { ...values };
  }

  async getSecret(name: string): Promise<string> {
    this.lookups.push(name);
    const value = this.values[name];

    if (value === undefined) {
      throw new SecretNotFoundError(this.name, name);
    }

    return value;
  }
}

export class UnavailableSecretProvider implements SecretProvider {
  readonly name: string;
  calls = 0;

  constructor(name: string) {
    this.name = name;
  }

  async getSecret(): Promise<string> {
    this.calls += 1;
    throw new SecretProviderUnavailableError(this.name, "connection refused");
  }
}

export const createFakeBackend = (
  implementation?: (params: PresignPutParams) => Promise<PresignedPutUrl>,
) => {
  const createPresignedPutUrl = vi.fn(
    implementation ??
      (async (params: PresignPutParams): Promise<PresignedPutUrl> => ({
        url: `https://storage.test/${params.bucket}/${params.key}?X-Amz-Expires=${params.expiresInSeconds}`,
        expiresAt: new Date(Date.now() + params.expiresInSeconds * 1000),
        headers: { "Content-Type": params.contentType },
      })),
  );

  const backend: StorageBackend = { createPresignedPutUrl };
  return { backend, createPresignedPutUrl };
};
