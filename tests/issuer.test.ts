import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { envSchema } from "../src/server/config.js";
import { CredentialResolver } from "../src/server/credentials.js";
import {
  BackendUnavailableError,
  FileTooLargeError,
  IncompleteCredentialsError,
  InvalidPathError,
  SigningError,
} from "../src/server/errors.js";
import {
  UploadUrlIssuer,
  issuerOptionsFromConfig,
  type UploadIssuerOptions,
} from "../src/server/issuer.js";
import type { ResolvedCredentials } from "../src/server/types.js";
import {
  InMemorySecretProvider,
  TEST_BUNDLE,
  TEST_FIELD_SECRETS,
  TEST_SECRET_NAMES,
  createFakeBackend,
} from "./test-utils.js";

const NOW = new Date("2024-03-05T07:08:09.000Z");
const RANDOM_ID = "0123456789abcdef0123456789abcdef";

const issuerOptions: UploadIssuerOptions = {
  keys: { prefix: "uploads", maxFilenameBytes: 200 },
  expiresInSeconds: 900,
  maxFileSizeBytes: 10 * 1024 * 1024,
  retryDelayMs: 1,
  now: () => new Date(Date.now()),
  randomId: () => RANDOM_ID,
};

const resolvedCredentials: ResolvedCredentials = {
  bundle: TEST_BUNDLE,
  provider: "env",
  source: "fields",
  resolvedAt: NOW,
};

const createCredentialStub = () => ({
  resolve: vi.fn(async () => resolvedCredentials),
  invalidate: vi.fn(),
});

describe("issuer", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("requestUploadUrl", () => {
    it("should resolve credentials, generate a key and return a presigned PUT", async () => {
      const provider = new InMemorySecretProvider("env", TEST_FIELD_SECRETS);
      const resolver = new CredentialResolver([provider], TEST_SECRET_NAMES);
      const { backend, createPresignedPutUrl } = createFakeBackend();
      const issuer = new UploadUrlIssuer(resolver, backend, issuerOptions);

      const upload = await issuer.requestUploadUrl({ originalFilename: "report final.pdf" });

      const key = `uploads/20240305_070809_${RANDOM_ID}_report_final.pdf`;
      expect(upload).toEqual({
        url: `https://storage.test/test-bucket/${key}?X-Amz-Expires=900`,
        method: "PUT",
        expiresAt: new Date("2024-03-05T07:23:09.000Z"),
        storageKey: { generatedKey: key },
        bucket: "test-bucket",
        headers: { "Content-Type": "application/pdf" },
      });
      expect(createPresignedPutUrl).toHaveBeenCalledWith({
        credentials: TEST_BUNDLE,
        bucket: "test-bucket",
        key,
        expiresInSeconds: 900,
        contentType: "application/pdf",
        contentLength: undefined,
        acl: undefined,
      });
    });

    it("should pass the requested content type, length and ACL to the backend", async () => {
      const credentials = createCredentialStub();
      const { backend, createPresignedPutUrl } = createFakeBackend();
      const issuer = new UploadUrlIssuer(credentials, backend, {
        ...issuerOptions,
        acl: "bucket-owner-full-control",
      });

      await issuer.requestUploadUrl({
        originalFilename: "data.bin",
        customPath: "reports/2024",
        contentType: "text/csv",
        contentLength: 2048,
      });

      expect(createPresignedPutUrl).toHaveBeenCalledWith(
        expect.objectContaining({
          key: `reports/2024/20240305_070809_${RANDOM_ID}_data.bin`,
          contentType: "text/csv",
          contentLength: 2048,
          acl: "bucket-owner-full-control",
        }),
      );
    });

    it("should fall back to application/octet-stream for unknown extensions", async () => {
      const { backend, createPresignedPutUrl } = createFakeBackend();
      const issuer = new UploadUrlIssuer(createCredentialStub(), backend, issuerOptions);

      await issuer.requestUploadUrl({ originalFilename: "payload.unknownext" });

      expect(createPresignedPutUrl).toHaveBeenCalledWith(
        expect.objectContaining({ contentType: "application/octet-stream" }),
      );
    });

    it("should reject traversal before touching secrets or storage", async () => {
      const provider = new InMemorySecretProvider("env", TEST_FIELD_SECRETS);
      const resolver = new CredentialResolver([provider], TEST_SECRET_NAMES);
      const { backend, createPresignedPutUrl } = createFakeBackend();
      const issuer = new UploadUrlIssuer(resolver, backend, issuerOptions);

      await expect(
        issuer.requestUploadUrl({ originalFilename: "x.txt", customPath: "../../etc" }),
      ).rejects.toBeInstanceOf(InvalidPathError);
      expect(provider.lookups).toEqual([]);
      expect(createPresignedPutUrl).not.toHaveBeenCalled();
    });

    it("should reject files over the size limit", async () => {
      const credentials = createCredentialStub();
      const { backend, createPresignedPutUrl } = createFakeBackend();
      const issuer = new UploadUrlIssuer(credentials, backend, issuerOptions);

      await expect(
        issuer.requestUploadUrl({ originalFilename: "big.iso", contentLength: 10 * 1024 * 1024 + 1 }),
      ).rejects.toBeInstanceOf(FileTooLargeError);
      expect(credentials.resolve).not.toHaveBeenCalled();
      expect(createPresignedPutUrl).not.toHaveBeenCalled();
    });

    it("should accept a file exactly at the size limit", async () => {
      const { backend } = createFakeBackend();
      const issuer = new UploadUrlIssuer(createCredentialStub(), backend, issuerOptions);

      await expect(
        issuer.requestUploadUrl({ originalFilename: "edge.iso", contentLength: 10 * 1024 * 1024 }),
      ).resolves.toMatchObject({ method: "PUT" });
    });

    it("should propagate credential failures without signing", async () => {
      const resolver = new CredentialResolver(
        [new InMemorySecretProvider("env", {})],
        TEST_SECRET_NAMES,
      );
      const { backend, createPresignedPutUrl } = createFakeBackend();
      const issuer = new UploadUrlIssuer(resolver, backend, issuerOptions);

      await expect(issuer.requestUploadUrl({ originalFilename: "a.txt" })).rejects.toBeInstanceOf(
        IncompleteCredentialsError,
      );
      expect(createPresignedPutUrl).not.toHaveBeenCalled();
    });

    it("should retry once when storage is briefly unavailable", async () => {
      const { backend, createPresignedPutUrl } = createFakeBackend();
      createPresignedPutUrl.mockRejectedValueOnce(new BackendUnavailableError("TimeoutError"));
      const issuer = new UploadUrlIssuer(createCredentialStub(), backend, issuerOptions);

      await expect(issuer.requestUploadUrl({ originalFilename: "a.txt" })).resolves.toMatchObject({
        bucket: "test-bucket",
      });
      expect(createPresignedPutUrl).toHaveBeenCalledTimes(2);
    });

    it("should give up after the second unavailable attempt", async () => {
      const { backend, createPresignedPutUrl } = createFakeBackend(async () => {
        throw new BackendUnavailableError("TimeoutError");
      });
      const issuer = new UploadUrlIssuer(createCredentialStub(), backend, issuerOptions);

      await expect(issuer.requestUploadUrl({ originalFilename: "a.txt" })).rejects.toBeInstanceOf(
        BackendUnavailableError,
      );
      expect(createPresignedPutUrl).toHaveBeenCalledTimes(2);
    });

    it("should not retry and should drop cached credentials on a signing error", async () => {
      const credentials = createCredentialStub();
      const { backend, createPresignedPutUrl } = createFakeBackend(async () => {
        throw new SigningError("Forbidden (HTTP 403)");
      });
      const issuer = new UploadUrlIssuer(credentials, backend, issuerOptions);

      await expect(issuer.requestUploadUrl({ originalFilename: "a.txt" })).rejects.toBeInstanceOf(
        SigningError,
      );
      expect(createPresignedPutUrl).toHaveBeenCalledTimes(1);
      expect(credentials.invalidate).toHaveBeenCalledTimes(1);
    });

    it("should keep cached credentials on other failures", async () => {
      const credentials = createCredentialStub();
      const { backend } = createFakeBackend(async () => {
        throw new BackendUnavailableError("TimeoutError");
      });
      const issuer = new UploadUrlIssuer(credentials, backend, issuerOptions);

      await expect(issuer.requestUploadUrl({ originalFilename: "a.txt" })).rejects.toThrow();
      expect(credentials.invalidate).not.toHaveBeenCalled();
    });
  });

  describe("requestUploadUrls", () => {
    it("should report each file on its own", async () => {
      const { backend } = createFakeBackend();
      const issuer = new UploadUrlIssuer(createCredentialStub(), backend, issuerOptions);

      const results = await issuer.requestUploadUrls([
        { originalFilename: "a.txt" },
        { originalFilename: "b.txt", customPath: "../escape" },
      ]);

      expect(results).toHaveLength(2);
      expect(results[0]).toMatchObject({
        ok: true,
        filename: "a.txt",
        upload: { storageKey: { generatedKey: `uploads/20240305_070809_${RANDOM_ID}_a.txt` } },
      });
      expect(results[1]).toEqual({
        ok: false,
        filename: "b.txt",
        code: "InvalidPath",
        error: "Upload path cannot contain . or .. segments.",
      });
    });

    it("should hide operator detail in per-file errors", async () => {
      const { backend } = createFakeBackend(async () => {
        throw new SigningError("InvalidAccessKeyId (HTTP 403)");
      });
      const issuer = new UploadUrlIssuer(createCredentialStub(), backend, issuerOptions);

      const [result] = await issuer.requestUploadUrls([{ originalFilename: "a.txt" }]);

      expect(result).toEqual({
        ok: false,
        filename: "a.txt",
        code: "SigningError",
        error: "Upload service credentials were rejected by storage. Contact the administrator.",
      });
    });

    it("should reject the batch on unexpected errors", async () => {
      const { backend } = createFakeBackend(async () => {
        throw new Error("boom");
      });
      const issuer = new UploadUrlIssuer(createCredentialStub(), backend, issuerOptions);

      await expect(issuer.requestUploadUrls([{ originalFilename: "a.txt" }])).rejects.toThrow("boom");
    });
  });

  describe("issuerOptionsFromConfig", () => {
    it("should derive issuer options from configuration", () => {
      const config = envSchema.parse({
        UPLOAD_KEY_PREFIX: "incoming",
        UPLOAD_ALLOWED_EXTENSIONS: "PDF, .csv",
        UPLOAD_MAX_FILE_SIZE_MB: "2",
        UPLOAD_URL_EXPIRES_SECONDS: "600",
        UPLOAD_OBJECT_ACL: "private",
      });

      expect(issuerOptionsFromConfig(config)).toEqual({
        keys: {
          prefix: "incoming",
          customPathRoot: "",
          maxFilenameBytes: 200,
          allowedExtensions: [".pdf", ".csv"],
        },
        expiresInSeconds: 600,
        maxFileSizeBytes: 2 * 1024 * 1024,
        acl: "private",
      });
    });
  });
});
