import * as Sentry from "@sentry/node";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { config } from "./config.js";

declare module "fastify" {
  interface FastifyRequest {
    sentryRequestStartMs?: number;
  }
}

const getRouteName = (request: FastifyRequest): string => {
  return request.routeOptions.url || request.url;
};

const SENSITIVE_KEYS = new Set([
  "secretaccesskey",
  "secret_access_key",
  "accesskeyid",
  "access_key_id",
  "authorization",
  "x-admin-token",
  "url",
  "signed_url",
]);

type MetricAttributes = Record<string, string | number | boolean>;

export const sanitizeAttributes = (value: unknown): unknown => {
  if (!value || typeof value !== "object") {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(sanitizeAttributes);
  }

  const output: Record<string, unknown> = {};

  for (const [key, entryValue] of Object.entries(value)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      output[key] = "[REDACTED]";
      continue;
    }

    output[key] = sanitizeAttributes(entryValue);
  }

  return output;
};

const sanitizeRecord = (attributes: Record<string, unknown> = {}): Record<string, unknown> => {
  return Object.fromEntries(
    Object.entries(attributes).map(([key, value]) => [
      key,
      SENSITIVE_KEYS.has(key.toLowerCase()) ? "[REDACTED]" : sanitizeAttributes(value),
    ]),
  );
};

const toMetricAttributes = (attributes?: Record<string, unknown>): MetricAttributes => {
  const output: MetricAttributes = {};

  for (const [key, value] of Object.entries(sanitizeRecord(attributes))) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      output[key] = value;
    }
  }

  return output;
};

const sentryEnabled = (): boolean => Boolean(config.SENTRY_DSN);
const sentryMetricsEnabled = (): boolean => sentryEnabled() && config.SENTRY_ENABLE_METRICS;

export const initializeObservability = (): void => {
  if (!sentryEnabled()) {
    return;
  }

  Sentry.init({
    dsn: config.SENTRY_DSN,
    environment: config.SENTRY_ENVIRONMENT || config.NODE_ENV,
    release: config.SENTRY_RELEASE,
    tracesSampleRate: config.SENTRY_TRACES_SAMPLE_RATE,
    enableLogs: config.SENTRY_ENABLE_LOGS,
    integrations: [
      Sentry.consoleLoggingIntegration({
        levels: ["log", "warn", "error"],
      }),
    ],
  });
};

type SentryLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const sentryLog = (
  level: SentryLogLevel,
  message: string,
  attributes?: Record<string, unknown>,
): void => {
  if (!sentryEnabled() || !config.SENTRY_ENABLE_LOGS) {
    return;
  }

  Sentry.logger[level](message, sanitizeRecord(attributes));
};

export const sentryCountMetric = (
  name: string,
  value: number,
  attributes?: Record<string, unknown>,
): void => {
  if (!sentryMetricsEnabled()) {
    return;
  }

  Sentry.metrics.count(name, value, {
    attributes: toMetricAttributes(attributes),
  });
};

export const sentryDistributionMetric = (
  name: string,
  value: number,
  unit: "none" | "millisecond" = "none",
  attributes?: Record<string, unknown>,
): void => {
  if (!sentryMetricsEnabled()) {
    return;
  }

  Sentry.metrics.distribution(name, value, {
    unit,
    attributes: toMetricAttributes(attributes),
  });
};

export const registerObservabilityHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", (request, _, done) => {
    request.sentryRequestStartMs = Date.now();

    sentryCountMetric("http.requests.total", 1, {
      method: request.method,
      route: getRouteName(request),
    });

    done();
  });

  app.addHook("onResponse", (request, reply, done) => {
    if (!sentryEnabled()) {
      done();
      return;
    }

    const startedAt = request.sentryRequestStartMs || Date.now();
    const durationMs = Date.now() - startedAt;
    const attributes = {
      method: request.method,
      route: getRouteName(request),
      status_code: reply.statusCode,
    };

    sentryLog("info", "API request completed", {
      ...attributes,
      duration_ms: durationMs,
    });
    sentryDistributionMetric("http.server.duration", durationMs, "millisecond", attributes);

    if (reply.statusCode >= 500) {
      sentryCountMetric("http.requests.errors", 1, attributes);
    }

    done();
  });
};

export const captureServerError = (
  error: unknown,
  request?: FastifyRequest,
  reply?: FastifyReply,
): void => {
  if (!sentryEnabled()) {
    return;
  }

  Sentry.withScope((scope) => {
    if (request) {
      scope.setTags({
        method: request.method,
        route: getRouteName(request),
      });
    }

    if (reply) {
      scope.setTag("status_code", reply.statusCode.toString());
    }

    Sentry.captureException(error);
  });
};

export const shutdownObservability = async (): Promise<void> => {
  if (!sentryEnabled()) {
    return;
  }

  await Sentry.flush(2000);
};
