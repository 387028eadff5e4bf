import { z } from "zod";
import type { AppConfig } from "./config.js";
import {
  CREDENTIAL_FIELDS,
  IncompleteCredentialsError,
  SecretNotFoundError,
  SecretProviderUnavailableError,
  toErrorMessage,
  type CredentialField,
} from "./errors.js";
import { sentryCountMetric, sentryLog } from "./observability.js";
import type { SecretProvider } from "./secrets/index.js";
import type { CredentialBundle, CredentialSource, ResolvedCredentials } from "./types.js";

export type SecretNames = {
  structured: string;
  fields: Record<CredentialField, string>;
};

export const secretNamesFromConfig = (
  config: Pick<
    AppConfig,
    | "SECRET_NAME_STRUCTURED"
    | "SECRET_NAME_ACCESS_KEY_ID"
    | "SECRET_NAME_SECRET_ACCESS_KEY"
    | "SECRET_NAME_REGION"
    | "SECRET_NAME_BUCKET_NAME"
  >,
): SecretNames => ({
  structured: config.SECRET_NAME_STRUCTURED,
  fields: {
    access_key_id: config.SECRET_NAME_ACCESS_KEY_ID,
    secret_access_key: config.SECRET_NAME_SECRET_ACCESS_KEY,
    region: config.SECRET_NAME_REGION,
    bucket_name: config.SECRET_NAME_BUCKET_NAME,
  },
});

type CredentialValues = Partial<Record<CredentialField, string>>;

// A provider holds either one structured secret or four field secrets. The
// structured form wins when present and the two are never combined.
type ProviderSecrets =
  | { kind: "structured"; values: CredentialValues }
  | { kind: "fields"; values: CredentialValues };

export type ProviderAttempt =
  | { provider: string; status: "unavailable"; reason: string }
  | { provider: string; status: "empty"; source: CredentialSource }
  | { provider: string; status: "partial"; source: CredentialSource; missing: CredentialField[] };

const structuredSecretSchema = z.object({
  access_key_id: z.string().optional(),
  secret_access_key: z.string().optional(),
  region: z.string().optional(),
  bucket_name: z.string().optional(),
});

const parseStructuredSecret = (raw: string): CredentialValues => {
  let decoded: unknown;

  try {
    decoded = JSON.parse(raw);
  } catch {
    return {};
  }

  const parsed = structuredSecretSchema.safeParse(decoded);
  return parsed.success ? parsed.data : {};
};

const cleanValues = (values: CredentialValues): CredentialValues => {
  const cleaned: CredentialValues = {};

  for (const field of CREDENTIAL_FIELDS) {
    const value = values[field]?.trim();

    if (value) {
      cleaned[field] = value;
    }
  }

  return cleaned;
};

const readOptionalSecret = async (
  provider: SecretProvider,
  name: string,
): Promise<string | undefined> => {
  try {
    return await provider.getSecret(name);
  } catch (error) {
    if (error instanceof SecretNotFoundError) {
      return undefined;
    }

    throw error;
  }
};

const readProviderSecrets = async (
  provider: SecretProvider,
  names: SecretNames,
): Promise<ProviderSecrets> => {
  const structured = await readOptionalSecret(provider, names.structured);

  if (structured !== undefined) {
    return { kind: "structured", values: cleanValues(parseStructuredSecret(structured)) };
  }

  const entries = await Promise.all(
    CREDENTIAL_FIELDS.map(
      async (field) => [field, await readOptionalSecret(provider, names.fields[field])] as const,
    ),
  );

  const values: CredentialValues = {};

  for (const [field, value] of entries) {
    if (value !== undefined) {
      values[field] = value;
    }
  }

  return { kind: "fields", values: cleanValues(values) };
};

const toBundle = (values: CredentialValues): CredentialBundle | null => {
  const { access_key_id, secret_access_key, region, bucket_name } = values;

  if (!access_key_id || !secret_access_key || !region || !bucket_name) {
    return null;
  }

  return Object.freeze({
    accessKeyId: access_key_id,
    secretAccessKey: secret_access_key,
    region,
    bucketName: bucket_name,
  });
};

const summarizeAttempts = (attempts: ProviderAttempt[]): Record<string, string> => {
  return Object.fromEntries(
    attempts.map((attempt) => [
      attempt.provider,
      attempt.status === "partial" ? `partial:${attempt.missing.join("|")}` : attempt.status,
    ]),
  );
};

/**
 * Walks `providers` in priority order and returns the first complete bundle.
 * Bundles are taken wholesale from one provider; fields are never mixed
 * across providers.
 */
export const resolveCredentials = async (
  providers: SecretProvider[],
  names: SecretNames,
): Promise<ResolvedCredentials> => {
  const attempts: ProviderAttempt[] = [];

  for (const provider of providers) {
    let secrets: ProviderSecrets;

    try {
      secrets = await readProviderSecrets(provider, names);
    } catch (error) {
      attempts.push({
        provider: provider.name,
        status: "unavailable",
        reason: error instanceof SecretProviderUnavailableError ? error.reason : toErrorMessage(error),
      });
      continue;
    }

    const bundle = toBundle(secrets.values);

    if (bundle) {
      if (attempts.length > 0) {
        sentryLog("warn", "Upload credentials resolved from fallback provider", {
          provider: provider.name,
          skipped: summarizeAttempts(attempts),
        });
      }

      return Object.freeze({
        bundle,
        provider: provider.name,
        source: secrets.kind,
        resolvedAt: new Date(),
      });
    }

    const missing = CREDENTIAL_FIELDS.filter((field) => !secrets.values[field]);

    attempts.push(
      missing.length === CREDENTIAL_FIELDS.length
        ? { provider: provider.name, status: "empty", source: secrets.kind }
        : { provider: provider.name, status: "partial", source: secrets.kind, missing },
    );
  }

  sentryLog("error", "Upload credentials could not be resolved", {
    attempts: summarizeAttempts(attempts),
  });

  const partial = attempts.find(
    (attempt): attempt is Extract<ProviderAttempt, { status: "partial" }> =>
      attempt.status === "partial",
  );

  if (partial) {
    throw new IncompleteCredentialsError(partial.missing, partial.provider);
  }

  const unavailable = attempts.filter(
    (attempt): attempt is Extract<ProviderAttempt, { status: "unavailable" }> =>
      attempt.status === "unavailable",
  );

  if (unavailable.length > 0) {
    throw new SecretProviderUnavailableError(
      unavailable.map((attempt) => attempt.provider).join(", "),
      unavailable.map((attempt) => `${attempt.provider}: ${attempt.reason}`).join("; "),
    );
  }

  throw new IncompleteCredentialsError([...CREDENTIAL_FIELDS]);
};

/**
 * Caches one resolved bundle for the life of the process. Concurrent callers
 * share the in-flight resolution; failures are not cached.
 */
export class CredentialResolver {
  private readonly providers: SecretProvider[];
  private readonly names: SecretNames;
  private current: Promise<ResolvedCredentials> | null = null;

  constructor(providers: SecretProvider[], names: SecretNames) {
    this.providers = providers;
    this.names = names;
  }

  resolve(): Promise<ResolvedCredentials> {
    if (!this.current) {
      const pending = this.load("initial");
      this.current = pending;
      void pending.catch(() => {
        if (this.current === pending) {
          this.current = null;
        }
      });
    }

    return this.current;
  }

  /**
   * Re-reads the providers and swaps the cached bundle only once the new one
   * is complete. Readers holding the previous bundle keep it.
   */
  async refresh(): Promise<ResolvedCredentials> {
    const next = await this.load("refresh");
    this.current = Promise.resolve(next);
    return next;
  }

  invalidate(): void {
    this.current = null;
  }

  private async load(reason: "initial" | "refresh"): Promise<ResolvedCredentials> {
    try {
      const resolved = await resolveCredentials(this.providers, this.names);
      sentryCountMetric("credentials.resolve", 1, {
        reason,
        status: "success",
        provider: resolved.provider,
        source: resolved.source,
      });
      sentryLog("info", "Upload credentials resolved", {
        reason,
        provider: resolved.provider,
        source: resolved.source,
        region: resolved.bundle.region,
        bucket: resolved.bundle.bucketName,
      });
      return resolved;
    } catch (error) {
      sentryCountMetric("credentials.resolve", 1, {
        reason,
        status: "failure",
      });
      throw error;
    }
  }
}
