import { InvalidArgumentError } from "commander";
import { MAX_PRESIGN_EXPIRY_SECONDS, type AppConfig } from "../server/config.js";

export type PresignCliOptions = {
  path?: string;
  contentType?: string;
  contentLength?: number;
  expiresIn?: number;
};

export const parsePositiveInt = (value: string): number => {
  const parsed = Number(value);

  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }

  return parsed;
};

export const parseExpiresIn = (value: string): number => {
  const parsed = parsePositiveInt(value);

  if (parsed > MAX_PRESIGN_EXPIRY_SECONDS) {
    throw new InvalidArgumentError(`Must be at most ${MAX_PRESIGN_EXPIRY_SECONDS} seconds.`);
  }

  return parsed;
};

/** Config the CLI builds its upload service from; `--expires-in` wins over the environment. */
export const applyCliOverrides = (config: AppConfig, options: PresignCliOptions): AppConfig => ({
  ...config,
  UPLOAD_URL_EXPIRES_SECONDS: options.expiresIn ?? config.UPLOAD_URL_EXPIRES_SECONDS,
});
