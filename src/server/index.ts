import "dotenv/config";
import { config } from "./config.js";
import { buildApp } from "./app.js";
import { initializeAuditLogger, shutdownAuditLogger } from "./audit/index.js";
import { toErrorMessage } from "./errors.js";
import {
  captureServerError,
  initializeObservability,
  sentryLog,
  shutdownObservability,
} from "./observability.js";
import { createUploadService } from "./service.js";

initializeObservability();
initializeAuditLogger(config);

const { resolver, backend, issuer } = createUploadService(config);

const app = await buildApp({
  issuer,
  resolver,
  batchMaxFiles: config.UPLOAD_BATCH_MAX_FILES,
  adminToken: config.ADMIN_API_TOKEN,
  corsOrigin: config.CORS_ORIGIN,
  logger: {
    level: config.NODE_ENV === "production" ? "info" : "debug",
  },
});

app.addHook("onClose", async () => {
  backend.destroy();
  await shutdownAuditLogger();
  await shutdownObservability();
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "Shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error(error);
        process.exit(1);
      },
    );
  });
}

const start = async () => {
  try {
    // Warm the credential cache; requests retry resolution if this fails.
    const resolved = await resolver.resolve();
    app.log.info(
      { provider: resolved.provider, source: resolved.source, bucket: resolved.bundle.bucketName },
      "Upload credentials resolved",
    );
  } catch (error) {
    app.log.warn({ reason: toErrorMessage(error) }, "Upload credentials not resolved at startup");
  }

  try {
    await app.listen({
      port: config.PORT,
      host: config.HOST,
    });
    sentryLog("info", "Upload service started", {
      port: config.PORT,
      environment: config.NODE_ENV,
    });
  } catch (error) {
    app.log.error(error);
    captureServerError(error);
    process.exit(1);
  }
};

await start();
