#!/usr/bin/env node
/**
 * One-shot presigned upload URL from the command line, using the same
 * credential sources and key layout as the HTTP service.
 *
 *   upload-presign "report final.pdf" --path reports/2024 --expires-in 600
 */
import "dotenv/config";
import { Command } from "commander";
import { config } from "../server/config.js";
import { initializeAuditLogger, shutdownAuditLogger } from "../server/audit/index.js";
import { isUploadServiceError, toErrorMessage } from "../server/errors.js";
import { toUploadResponse } from "../server/routes.js";
import { createUploadService } from "../server/service.js";
import {
  applyCliOverrides,
  parseExpiresIn,
  parsePositiveInt,
  type PresignCliOptions,
} from "./options.js";

const program = new Command()
  .name("upload-presign")
  .description("Print a presigned PUT URL for one file")
  .argument("<filename>", "original file name, used for the generated storage key")
  .option("-p, --path <path>", "custom destination path instead of the configured prefix")
  .option("-t, --content-type <type>", "content type the upload must be sent with")
  .option("-l, --content-length <bytes>", "exact size the upload must have", parsePositiveInt)
  .option("-e, --expires-in <seconds>", "URL lifetime in seconds", parseExpiresIn)
  .action(async (filename: string, options: PresignCliOptions) => {
    initializeAuditLogger(config);

    const { backend, issuer } = createUploadService(applyCliOverrides(config, options));

    try {
      const upload = await issuer.requestUploadUrl({
        originalFilename: filename,
        customPath: options.path,
        contentType: options.contentType,
        contentLength: options.contentLength,
      });

      process.stdout.write(`${JSON.stringify(toUploadResponse(upload), null, 2)}\n`);
    } catch (error) {
      const code = isUploadServiceError(error) ? error.code : "InternalError";
      process.stderr.write(`${code}: ${toErrorMessage(error)}\n`);
      process.exitCode = 1;
    } finally {
      backend.destroy();
      await shutdownAuditLogger();
    }
  });

await program.parseAsync(process.argv);
