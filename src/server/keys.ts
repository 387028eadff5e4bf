import { randomBytes } from "node:crypto";
import { InvalidPathError, UnsupportedFileTypeError } from "./errors.js";
import type { StorageKey, UploadRequest } from "./types.js";

export type KeyGeneratorOptions = {
  prefix: string;
  customPathRoot?: string;
  maxFilenameBytes: number;
  allowedExtensions?: string[];
};

export type KeyGeneratorSources = {
  now?: () => Date;
  randomId?: () => string;
};

const MAX_PATH_BYTES = 512;

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f]/;
const UNSAFE_CHARACTER_RUN = /[^\p{L}\p{M}\p{N}._-]+/gu;

const byteLength = (value: string): number => Buffer.byteLength(value, "utf8");

const truncateToBytes = (value: string, maxBytes: number): string => {
  if (byteLength(value) <= maxBytes) {
    return value;
  }

  let output = "";
  let used = 0;

  for (const character of value) {
    const size = byteLength(character);

    if (used + size > maxBytes) {
      break;
    }

    output += character;
    used += size;
  }

  return output;
};

const sanitizeSegment = (value: string): string => {
  return value
    .normalize("NFC")
    .replace(UNSAFE_CHARACTER_RUN, "_")
    .replace(/\.{2,}/g, ".");
};

export const getExtension = (filename: string): string => {
  const dot = filename.lastIndexOf(".");
  return dot > 0 ? filename.slice(dot) : "";
};

const truncateFilename = (filename: string, maxBytes: number): string => {
  if (byteLength(filename) <= maxBytes) {
    return filename;
  }

  const extension = getExtension(filename);
  const extensionBytes = byteLength(extension);

  if (!extension || extensionBytes > maxBytes / 2) {
    return truncateToBytes(filename, maxBytes).replace(/\.+$/, "");
  }

  const stem = filename.slice(0, filename.length - extension.length);
  const truncatedStem = truncateToBytes(stem, maxBytes - extensionBytes).replace(/[._-]+$/, "");

  return `${truncatedStem || "file"}${extension}`;
};

/**
 * Reduces a client-supplied filename to letters, digits, `.`, `_` and `-`,
 * without leading dots or `..`, at most `maxBytes` UTF-8 bytes long. The
 * extension survives truncation.
 */
export const sanitizeFilename = (filename: string, maxBytes: number): string => {
  const cleaned = sanitizeSegment(filename).replace(/^[._]+/, "");
  return truncateFilename(cleaned || "file", maxBytes);
};

/**
 * Validates a slash-separated key path. Absolute paths, `.`/`..` segments and
 * control characters are rejected; other unsafe characters are replaced.
 */
export const normalizeKeyPath = (value: string, label = "Upload path"): string => {
  if (CONTROL_CHARACTERS.test(value)) {
    throw new InvalidPathError(`${label} contains control characters.`);
  }

  const unified = value.replace(/\\/g, "/").trim();

  if (unified.startsWith("/")) {
    throw new InvalidPathError(`${label} must be relative to the upload root.`);
  }

  const segments = unified
    .split("/")
    .map((segment) => segment.trim())
    .filter(Boolean);

  if (!segments.length) {
    throw new InvalidPathError(`${label} is empty.`);
  }

  const normalized = segments.map((segment) => {
    if (/^\.+$/.test(segment)) {
      throw new InvalidPathError(`${label} cannot contain . or .. segments.`);
    }

    return sanitizeSegment(segment).replace(/^\.+/, "") || "_";
  });

  const joined = normalized.join("/");

  if (byteLength(joined) > MAX_PATH_BYTES) {
    throw new InvalidPathError(`${label} is too long.`);
  }

  return joined;
};

export const formatKeyTimestamp = (date: Date): string => {
  const pad = (value: number) => `${value}`.padStart(2, "0");

  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
};

export const generateRandomId = (): string => randomBytes(16).toString("hex");

const resolveDirectory = (request: UploadRequest, options: KeyGeneratorOptions): string => {
  const customPath = request.customPath?.trim();

  if (!customPath) {
    return normalizeKeyPath(options.prefix, "Key prefix");
  }

  const normalized = normalizeKeyPath(customPath);
  const root = options.customPathRoot?.trim();

  return root ? `${normalizeKeyPath(root, "Custom path root")}/${normalized}` : normalized;
};

/**
 * Builds `<directory>/<YYYYMMDD_HHMMSS>_<random id>_<filename>`, where the
 * directory is the configured prefix or the request's custom path.
 */
export const generateStorageKey = (
  request: UploadRequest,
  options: KeyGeneratorOptions,
  sources: KeyGeneratorSources = {},
): StorageKey => {
  const directory = resolveDirectory(request, options);
  const filename = sanitizeFilename(request.originalFilename, options.maxFilenameBytes);

  if (options.allowedExtensions?.length) {
    const extension = getExtension(filename).toLowerCase();

    if (!options.allowedExtensions.includes(extension)) {
      throw new UnsupportedFileTypeError(extension, options.allowedExtensions);
    }
  }

  const timestamp = formatKeyTimestamp((sources.now ?? (() => new Date()))());
  const randomId = (sources.randomId ?? generateRandomId)();

  return {
    generatedKey: `${directory}/${timestamp}_${randomId}_${filename}`,
  };
};
