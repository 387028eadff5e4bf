import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import { AppError, isUploadServiceError, toErrorMessage } from "./errors.js";
import { captureServerError, registerObservabilityHooks } from "./observability.js";
import { registerUploadRoutes, type UploadRouteOptions } from "./routes.js";
import type { ApiErrorShape } from "./types.js";

export type BuildAppOptions = UploadRouteOptions & {
  corsOrigin?: string;
  logger?: FastifyServerOptions["logger"];
};

const toCorsOrigin = (value?: string): boolean | string[] => {
  if (!value || value.trim() === "*") {
    return true;
  }

  return value
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);
};

const getStatusCode = (error: unknown): number => {
  if (error && typeof error === "object" && "statusCode" in error) {
    const { statusCode } = error;
    return typeof statusCode === "number" ? statusCode : 500;
  }

  return 500;
};

export const buildApp = async (options: BuildAppOptions): Promise<FastifyInstance> => {
  const app = Fastify({
    logger: options.logger ?? true,
    bodyLimit: 256 * 1024,
  });

  await app.register(cors, {
    origin: toCorsOrigin(options.corsOrigin),
    methods: ["GET", "POST"],
  });
  registerObservabilityHooks(app);
  registerUploadRoutes(app, options);

  app.setErrorHandler((error, request, reply) => {
    if (isUploadServiceError(error)) {
      // Operator detail stays in the log; callers get the public message.
      if (error.statusCode >= 500) {
        request.log.error({ code: error.code, reason: error.message }, "Upload request failed");
        captureServerError(error, request, reply);
      } else {
        request.log.info({ code: error.code, reason: error.message }, "Upload request rejected");
      }

      const body: ApiErrorShape = { error: error.publicMessage, code: error.code };
      return reply.code(error.statusCode).send(body);
    }

    if (error instanceof AppError) {
      const body: ApiErrorShape = {
        error: error.message,
        details: error.exposeDetails ? error.message : undefined,
      };
      return reply.code(error.statusCode).send(body);
    }

    const statusCode = getStatusCode(error);

    if (statusCode >= 500) {
      request.log.error(error);
      captureServerError(error, request, reply);
    }

    const body: ApiErrorShape = {
      error: statusCode >= 500 ? "Internal server error" : toErrorMessage(error),
    };
    return reply.code(statusCode).send(body);
  });

  return app;
};
