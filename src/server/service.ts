import type { AppConfig } from "./config.js";
import { CredentialResolver, secretNamesFromConfig } from "./credentials.js";
import { UploadUrlIssuer, issuerOptionsFromConfig } from "./issuer.js";
import { S3StorageBackend } from "./s3.js";
import { createSecretProviders } from "./secrets/index.js";

export type UploadService = {
  resolver: CredentialResolver;
  backend: S3StorageBackend;
  issuer: UploadUrlIssuer;
};

/** Wires providers, resolver, storage backend and issuer from configuration. */
export const createUploadService = (config: AppConfig): UploadService => {
  const resolver = new CredentialResolver(
    createSecretProviders(config),
    secretNamesFromConfig(config),
  );
  const backend = new S3StorageBackend({
    endpoint: config.S3_ENDPOINT,
    forcePathStyle: config.S3_FORCE_PATH_STYLE,
    timeoutMs: config.STORAGE_TIMEOUT_MS,
    verifyCredentials: config.UPLOAD_VERIFY_CREDENTIALS,
  });
  const issuer = new UploadUrlIssuer(resolver, backend, issuerOptionsFromConfig(config));

  return { resolver, backend, issuer };
};
