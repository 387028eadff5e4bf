import { SecretNotFoundError } from "../errors.js";
import type { SecretProvider } from "./types.js";

/** Secret names map to upper-cased variables: `aws_region` -> `AWS_REGION`. */
export const toEnvVarName = (secretName: string): string => {
  return secretName.replace(/[^A-Za-z0-9]+/g, "_").toUpperCase();
};

export class EnvSecretProvider implements SecretProvider {
  readonly name: string = "env";
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  async getSecret(name: string): Promise<string> {
    const value = this.env[toEnvVarName(name)];

    if (value === undefined) {
      throw new SecretNotFoundError(this.name, name);
    }

    return value;
  }
}
