import { readFile } from "node:fs/promises";
import { parse } from "dotenv";
import { SecretNotFoundError, SecretProviderUnavailableError, toErrorName } from "../errors.js";
import { toEnvVarName } from "./env-provider.js";
import type { SecretProvider } from "./types.js";

export type EnvFileSecretProviderOptions = {
  path: string;
  timeoutMs: number;
};

/**
 * Reads secrets from a dotenv-formatted file. The file is re-read on every
 * lookup; the credential resolver caches the resolved bundle instead.
 */
export class EnvFileSecretProvider implements SecretProvider {
  readonly name: string = "env-file";
  private readonly options: EnvFileSecretProviderOptions;

  constructor(options: EnvFileSecretProviderOptions) {
    this.options = options;
  }

  async getSecret(name: string): Promise<string> {
    const values = await this.load();
    const value = values[toEnvVarName(name)];

    if (value === undefined) {
      throw new SecretNotFoundError(this.name, name);
    }

    return value;
  }

  private async load(): Promise<Record<string, string>> {
    let contents: string;

    try {
      contents = await readFile(this.options.path, {
        encoding: "utf8",
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const reason = toErrorName(error) === "ENOENT" ? "file not found" : "file unreadable";
      throw new SecretProviderUnavailableError(this.name, `${reason} (${this.options.path})`, {
        cause: error,
      });
    }

    return parse(contents);
  }
}
