export class AppError extends Error {
  statusCode: number;
  exposeDetails: boolean;

  constructor(message: string, statusCode = 500, exposeDetails = false) {
    super(message);
    this.statusCode = statusCode;
    this.exposeDetails = exposeDetails;
  }
}

export type UploadErrorCode =
  | "SecretNotFound"
  | "SecretProviderUnavailable"
  | "IncompleteCredentials"
  | "InvalidPath"
  | "UnsupportedFileType"
  | "FileTooLarge"
  | "SigningError"
  | "BackendUnavailable";

const MISCONFIGURED_MESSAGE = "Upload service is misconfigured. Contact the administrator.";

/**
 * Message shown to callers for each error kind. Request validation errors
 * carry their own reason instead; everything else hides operator detail.
 */
export const PUBLIC_ERROR_MESSAGES: Record<UploadErrorCode, string> = {
  SecretNotFound: MISCONFIGURED_MESSAGE,
  SecretProviderUnavailable:
    "Upload service credentials are temporarily unavailable. Retry shortly.",
  IncompleteCredentials: MISCONFIGURED_MESSAGE,
  InvalidPath: "The requested upload path is not allowed.",
  UnsupportedFileType: "This file type is not accepted.",
  FileTooLarge: "The file exceeds the maximum upload size.",
  SigningError:
    "Upload service credentials were rejected by storage. Contact the administrator.",
  BackendUnavailable: "Storage is temporarily unavailable. Retry shortly.",
};

export abstract class UploadServiceError extends AppError {
  abstract readonly code: UploadErrorCode;

  get publicMessage(): string {
    return this.exposeDetails ? this.message : PUBLIC_ERROR_MESSAGES[this.code];
  }
}

export class SecretNotFoundError extends UploadServiceError {
  readonly code = "SecretNotFound";
  readonly secretName: string;
  readonly provider: string;

  constructor(provider: string, secretName: string) {
    super(`Secret "${secretName}" not found in ${provider}`, 503);
    this.name = "SecretNotFoundError";
    this.provider = provider;
    this.secretName = secretName;
  }
}

export class SecretProviderUnavailableError extends UploadServiceError {
  readonly code = "SecretProviderUnavailable";
  readonly provider: string;
  readonly reason: string;

  constructor(provider: string, reason: string, options?: { cause?: unknown }) {
    super(`Secret provider ${provider} is unavailable: ${reason}`, 503);
    this.name = "SecretProviderUnavailableError";
    this.provider = provider;
    this.reason = reason;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export const CREDENTIAL_FIELDS = [
  "access_key_id",
  "secret_access_key",
  "region",
  "bucket_name",
] as const;

export type CredentialField = (typeof CREDENTIAL_FIELDS)[number];

export class IncompleteCredentialsError extends UploadServiceError {
  readonly code = "IncompleteCredentials";
  readonly missingFields: CredentialField[];
  readonly provider?: string;

  constructor(missingFields: CredentialField[], provider?: string) {
    const source = provider ? ` in ${provider}` : " in any secret provider";
    super(`Missing credential fields${source}: ${missingFields.join(", ")}`, 503);
    this.name = "IncompleteCredentialsError";
    this.missingFields = missingFields;
    this.provider = provider;
  }
}

export class InvalidPathError extends UploadServiceError {
  readonly code = "InvalidPath";

  constructor(message: string) {
    super(message, 400, true);
    this.name = "InvalidPathError";
  }
}

export class UnsupportedFileTypeError extends UploadServiceError {
  readonly code = "UnsupportedFileType";
  readonly extension: string;

  constructor(extension: string, allowed: string[]) {
    super(
      `File extension "${extension || "(none)"}" is not allowed. Allowed: ${allowed.join(", ")}`,
      400,
      true,
    );
    this.name = "UnsupportedFileTypeError";
    this.extension = extension;
  }
}

export class FileTooLargeError extends UploadServiceError {
  readonly code = "FileTooLarge";

  constructor(sizeBytes: number, maxBytes: number) {
    super(`File size ${sizeBytes} bytes exceeds the limit of ${maxBytes} bytes.`, 413, true);
    this.name = "FileTooLargeError";
  }
}

export class SigningError extends UploadServiceError {
  readonly code = "SigningError";

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Storage rejected the signing credentials: ${reason}`, 502);
    this.name = "SigningError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class BackendUnavailableError extends UploadServiceError {
  readonly code = "BackendUnavailable";

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Storage backend unavailable: ${reason}`, 503);
    this.name = "BackendUnavailableError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export const isUploadServiceError = (error: unknown): error is UploadServiceError => {
  return error instanceof UploadServiceError;
};

export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  return "Unknown error";
};

export const toErrorName = (error: unknown): string | undefined => {
  if (!error || typeof error !== "object") {
    return undefined;
  }

  for (const field of ["Code", "code", "name"] as const) {
    if (field in error) {
      const value: unknown = Reflect.get(error, field);

      if (typeof value === "string") {
        return value;
      }
    }
  }

  return undefined;
};

export const toHttpStatusCode = (error: unknown): number | undefined => {
  if (!error || typeof error !== "object" || !("$metadata" in error)) {
    return undefined;
  }

  const metadata = error.$metadata;

  if (!metadata || typeof metadata !== "object" || !("httpStatusCode" in metadata)) {
    return undefined;
  }

  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
};
