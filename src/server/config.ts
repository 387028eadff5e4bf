import { z } from "zod";

const parseEnvBool = (val: unknown, def: boolean): boolean => {
  if (typeof val === "boolean") return val;
  if (typeof val === "string") {
    const v = val.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(v)) return true;
    if (["0", "false", "no", "off", ""].includes(v)) return false;
  }
  if (typeof val === "number") return val !== 0;
  return def;
};

const parseEnvList = (val: unknown): unknown => {
  if (typeof val !== "string") return val;
  return val
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
};

const normalizeExtension = (value: string): string => {
  const lower = value.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
};

export const SECRET_PROVIDER_NAMES = ["secrets-manager", "env-file", "env"] as const;
export type SecretProviderName = (typeof SECRET_PROVIDER_NAMES)[number];

export const OBJECT_ACLS = [
  "private",
  "public-read",
  "authenticated-read",
  "bucket-owner-read",
  "bucket-owner-full-control",
] as const;
export type ObjectAcl = (typeof OBJECT_ACLS)[number];

// S3 rejects presigned URLs valid for longer than seven days.
export const MAX_PRESIGN_EXPIRY_SECONDS = 604800;

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default("0.0.0.0"),
  CORS_ORIGIN: z.string().default("*"),
  S3_ENDPOINT: z.string().optional(),
  S3_FORCE_PATH_STYLE: z.preprocess((v) => parseEnvBool(v, false), z.boolean()).default(false),
  SECRET_PROVIDER_ORDER: z
    .preprocess(parseEnvList, z.array(z.enum(SECRET_PROVIDER_NAMES)).min(1))
    .default(["secrets-manager", "env"]),
  SECRETS_MANAGER_REGION: z.string().optional(),
  SECRETS_MANAGER_ENDPOINT: z.string().optional(),
  SECRETS_MANAGER_PREFIX: z.string().default(""),
  ENV_FILE_PATH: z.string().default(".secrets.env"),
  SECRET_NAME_ACCESS_KEY_ID: z.string().min(1).default("aws_access_key_id"),
  SECRET_NAME_SECRET_ACCESS_KEY: z.string().min(1).default("aws_secret_access_key"),
  SECRET_NAME_REGION: z.string().min(1).default("aws_region"),
  SECRET_NAME_BUCKET_NAME: z.string().min(1).default("s3_bucket_name"),
  SECRET_NAME_STRUCTURED: z.string().min(1).default("aws_credentials"),
  SECRET_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  STORAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  UPLOAD_URL_EXPIRES_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_PRESIGN_EXPIRY_SECONDS)
    .default(900),
  UPLOAD_KEY_PREFIX: z.string().min(1).default("uploads"),
  UPLOAD_CUSTOM_PATH_ROOT: z.string().default(""),
  UPLOAD_MAX_FILENAME_BYTES: z.coerce.number().int().min(16).max(1024).default(200),
  UPLOAD_ALLOWED_EXTENSIONS: z
    .preprocess(parseEnvList, z.array(z.string().min(1)).transform((list) => list.map(normalizeExtension)))
    .optional(),
  UPLOAD_MAX_FILE_SIZE_MB: z.coerce.number().positive().default(100),
  UPLOAD_OBJECT_ACL: z.enum(OBJECT_ACLS).optional(),
  UPLOAD_VERIFY_CREDENTIALS: z
    .preprocess((v) => parseEnvBool(v, false), z.boolean())
    .default(false),
  UPLOAD_BATCH_MAX_FILES: z.coerce.number().int().min(1).max(100).default(20),
  ADMIN_API_TOKEN: z.string().min(16).optional(),
  AUDIT_LOG_SINK: z.enum(["filesystem", "none"]).default("filesystem"),
  AUDIT_LOG_DIR: z.string().default("audit-logs"),
  AUDIT_LOG_RETENTION_DAYS: z.coerce.number().int().min(1).default(30),
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_RELEASE: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  SENTRY_ENABLE_LOGS: z.preprocess((v) => parseEnvBool(v, true), z.boolean()).default(true),
  SENTRY_ENABLE_METRICS: z.preprocess((v) => parseEnvBool(v, true), z.boolean()).default(true),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("Invalid environment configuration", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const config = parsed.data;
