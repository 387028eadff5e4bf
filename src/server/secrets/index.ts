import type { AppConfig, SecretProviderName } from "../config.js";
import { EnvFileSecretProvider } from "./env-file-provider.js";
import { EnvSecretProvider } from "./env-provider.js";
import { SecretsManagerSecretProvider } from "./secrets-manager-provider.js";
import type { SecretProvider } from "./types.js";

type ProviderConfig = Pick<
  AppConfig,
  | "SECRET_PROVIDER_ORDER"
  | "SECRETS_MANAGER_REGION"
  | "SECRETS_MANAGER_ENDPOINT"
  | "SECRETS_MANAGER_PREFIX"
  | "ENV_FILE_PATH"
  | "SECRET_FETCH_TIMEOUT_MS"
>;

const createSecretProvider = (name: SecretProviderName, config: ProviderConfig): SecretProvider => {
  switch (name) {
    case "secrets-manager":
      return new SecretsManagerSecretProvider({
        region: config.SECRETS_MANAGER_REGION,
        endpoint: config.SECRETS_MANAGER_ENDPOINT,
        prefix: config.SECRETS_MANAGER_PREFIX,
        timeoutMs: config.SECRET_FETCH_TIMEOUT_MS,
      });
    case "env-file":
      return new EnvFileSecretProvider({
        path: config.ENV_FILE_PATH,
        timeoutMs: config.SECRET_FETCH_TIMEOUT_MS,
      });
    case "env":
      return new EnvSecretProvider();
  }
};

/** Providers in resolution priority order; duplicates keep their first position. */
export const createSecretProviders = (config: ProviderConfig): SecretProvider[] => {
  const order = [...new Set(config.SECRET_PROVIDER_ORDER)];
  return order.map((name) => createSecretProvider(name, config));
};

export { EnvFileSecretProvider } from "./env-file-provider.js";
export { EnvSecretProvider, toEnvVarName } from "./env-provider.js";
export { SecretsManagerSecretProvider } from "./secrets-manager-provider.js";
export type { SecretProvider } from "./types.js";
