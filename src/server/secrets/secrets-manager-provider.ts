import {
  GetSecretValueCommand,
  SecretsManagerClient,
  type GetSecretValueCommandOutput,
} from "@aws-sdk/client-secrets-manager";
import {
  SecretNotFoundError,
  SecretProviderUnavailableError,
  toErrorMessage,
  toErrorName,
} from "../errors.js";
import { sentryLog } from "../observability.js";
import { withTimeoutAndRetry } from "../retry.js";
import type { SecretProvider } from "./types.js";

export type SecretsManagerProviderOptions = {
  region?: string;
  endpoint?: string;
  prefix?: string;
  timeoutMs: number;
  retryDelayMs?: number;
};

export type SecretsManagerSender = {
  send(
    command: GetSecretValueCommand,
    options?: { abortSignal?: AbortSignal },
  ): Promise<GetSecretValueCommandOutput>;
};

export class SecretsManagerSecretProvider implements SecretProvider {
  readonly name: string = "secrets-manager";
  private readonly client: SecretsManagerSender;
  private readonly options: SecretsManagerProviderOptions;

  constructor(options: SecretsManagerProviderOptions, client?: SecretsManagerSender) {
    this.options = options;
    this.client =
      client ??
      new SecretsManagerClient({
        region: options.region,
        endpoint: options.endpoint,
        // retries are handled by withTimeoutAndRetry
        maxAttempts: 1,
      });
  }

  async getSecret(name: string): Promise<string> {
    const response = await this.fetchSecretValue(name);

    if (typeof response.SecretString === "string") {
      return response.SecretString;
    }

    if (response.SecretBinary) {
      return Buffer.from(response.SecretBinary).toString("utf8");
    }

    throw new SecretNotFoundError(this.name, name);
  }

  private async fetchSecretValue(name: string): Promise<GetSecretValueCommandOutput> {
    const secretId = `${this.options.prefix ?? ""}${name}`;

    try {
      return await withTimeoutAndRetry(
        (abortSignal) =>
          this.client.send(new GetSecretValueCommand({ SecretId: secretId }), { abortSignal }),
        {
          timeoutMs: this.options.timeoutMs,
          minDelayMs: this.options.retryDelayMs,
          onRetry: (error, attempt) => {
            sentryLog("warn", "Retrying secret fetch", {
              provider: this.name,
              secret_name: name,
              attempt,
              error: toErrorName(error),
            });
          },
        },
      );
    } catch (error) {
      if (toErrorName(error) === "ResourceNotFoundException") {
        throw new SecretNotFoundError(this.name, name);
      }

      throw new SecretProviderUnavailableError(this.name, toErrorMessage(error), { cause: error });
    }
  }
}
