import { createHash, timingSafeEqual } from "node:crypto";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";
import { AppError } from "./errors.js";
import type { CredentialResolver } from "./credentials.js";
import type { UploadUrlIssuer } from "./issuer.js";
import type { PresignedUpload, UploadRequest } from "./types.js";

export type UploadRouteOptions = {
  issuer: Pick<UploadUrlIssuer, "requestUploadUrl" | "requestUploadUrls">;
  resolver: Pick<CredentialResolver, "refresh">;
  batchMaxFiles: number;
  adminToken?: string;
};

const presignSchema = z.object({
  filename: z.string().trim().min(1).max(1024),
  path: z.string().max(1024).optional(),
  contentType: z
    .string()
    .trim()
    .regex(/^[\w.+-]+\/[\w.+-]+(\s*;.*)?$/, "Invalid content type")
    .max(255)
    .optional(),
  contentLength: z.number().int().nonnegative().optional(),
});

type PresignBody = z.infer<typeof presignSchema>;

const toUploadRequest = (body: PresignBody): UploadRequest => ({
  originalFilename: body.filename,
  customPath: body.path,
  contentType: body.contentType,
  contentLength: body.contentLength,
});

export const toUploadResponse = (upload: PresignedUpload) => ({
  url: upload.url,
  method: upload.method,
  headers: upload.headers,
  bucket: upload.bucket,
  key: upload.storageKey.generatedKey,
  expiresAt: upload.expiresAt.toISOString(),
});

const digest = (value: string): Buffer => createHash("sha256").update(value).digest();

const requireAdminToken = (request: FastifyRequest, expected: string): void => {
  const provided = request.headers["x-admin-token"];

  if (typeof provided !== "string" || !timingSafeEqual(digest(provided), digest(expected))) {
    throw new AppError("Not authorized", 401);
  }
};

export const registerUploadRoutes = (app: FastifyInstance, options: UploadRouteOptions): void => {
  const batchSchema = z.object({
    files: z.array(presignSchema).min(1).max(options.batchMaxFiles),
  });

  app.get("/api/health", async () => ({ ok: true }));

  app.post("/api/uploads/presign", async (request, reply) => {
    const parsed = presignSchema.safeParse(request.body);

    if (!parsed.success) {
      throw new AppError("Invalid upload request payload", 400, true);
    }

    const upload = await options.issuer.requestUploadUrl(toUploadRequest(parsed.data), {
      clientIp: request.ip,
    });

    return reply.code(201).send(toUploadResponse(upload));
  });

  app.post("/api/uploads/presign/batch", async (request, reply) => {
    const parsed = batchSchema.safeParse(request.body);

    if (!parsed.success) {
      throw new AppError(
        `Invalid batch payload: provide 1 to ${options.batchMaxFiles} files`,
        400,
        true,
      );
    }

    const results = await options.issuer.requestUploadUrls(parsed.data.files.map(toUploadRequest), {
      clientIp: request.ip,
    });

    return reply.send({
      results: results.map((result) =>
        result.ok
          ? { ok: true, filename: result.filename, upload: toUploadResponse(result.upload) }
          : result,
      ),
    });
  });

  const { adminToken } = options;

  if (!adminToken) {
    return;
  }

  app.post("/api/admin/credentials/refresh", async (request, reply) => {
    requireAdminToken(request, adminToken);

    const resolved = await options.resolver.refresh();

    return reply.send({
      ok: true,
      provider: resolved.provider,
      source: resolved.source,
      resolvedAt: resolved.resolvedAt.toISOString(),
    });
  });
};
