// src/config/app.config.ts
// Purpose: Typed, validated runtime configuration parsed once from the environment.

import { z } from "zod";

const csv = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean),
  );

export const DEFAULT_ATTACHMENT_MIME_TYPES = [
  "image/jpeg",
  "image/png",
  "image/gif",
  "image/webp",
  "application/pdf",
  "video/mp4",
  "video/quicktime",
  "text/plain",
] as const;

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3001),
    MODE: z.enum(["MOCK", "LIVE"]).default("MOCK"),
    DATABASE_URL: z.string().url().optional(),
    REDIS_URL: z.string().optional(),
    JWT_SECRET: z.string().min(1),
    INTERNAL_API_KEY: z.string().min(1),
    CORS_ORIGIN: z.string().default("*"),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

    BATCH_CHUNK_SIZE: z.coerce.number().int().min(1).max(5000).default(250),
    BATCH_WORKER_COUNT: z.coerce.number().int().min(1).max(64).default(4),
    BATCH_DEFAULT_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
    BATCH_FAILURE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.05),
    BATCH_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(50),

    ATTACHMENT_MAX_BYTES: z.coerce
      .number()
      .int()
      .positive()
      .default(10 * 1024 * 1024),
    ATTACHMENT_MIME_TYPES: csv.optional(),

    CUSTOMER_APPROVAL_COST_THRESHOLD: z.coerce.number().min(0).default(500),
    PUBLIC_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(60),

    NOTIFICATION_WEBHOOK_URL: z.string().url().optional(),
    SCANNER_URL: z.string().url().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.MODE === "LIVE" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when MODE=LIVE",
      });
    }
  });

export type AppConfig = {
  port: number;
  mode: "MOCK" | "LIVE";
  databaseUrl?: string;
  redisUrl?: string;
  jwtSecret: string;
  internalApiKey: string;
  corsOrigin: string;
  requestTimeoutMs: number;
  batch: BatchConfig;
  attachments: AttachmentConfig;
  repairs: { customerApprovalCostThreshold: number };
  publicApi: { cacheTtlSeconds: number };
  collaborators: { notificationWebhookUrl?: string; scannerUrl?: string };
};

export type BatchConfig = {
  chunkSize: number;
  workerCount: number;
  defaultMaxRetries: number;
  failureThreshold: number;
  retryBackoffMs: number;
};

export type AttachmentConfig = {
  maxBytes: number;
  mimeTypes: readonly string[];
};

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([field, messages]) => `${field}: ${(messages ?? []).join(", ")}`)
      .join("; ");
    throw new Error(`Invalid environment configuration (${fields})`);
  }

  const e = parsed.data;

  return Object.freeze({
    port: e.PORT,
    mode: e.MODE,
    databaseUrl: e.DATABASE_URL,
    redisUrl: e.REDIS_URL,
    jwtSecret: e.JWT_SECRET,
    internalApiKey: e.INTERNAL_API_KEY,
    corsOrigin: e.CORS_ORIGIN,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    batch: {
      chunkSize: e.BATCH_CHUNK_SIZE,
      workerCount: e.BATCH_WORKER_COUNT,
      defaultMaxRetries: e.BATCH_DEFAULT_MAX_RETRIES,
      failureThreshold: e.BATCH_FAILURE_THRESHOLD,
      retryBackoffMs: e.BATCH_RETRY_BACKOFF_MS,
    },
    attachments: {
      maxBytes: e.ATTACHMENT_MAX_BYTES,
      mimeTypes: e.ATTACHMENT_MIME_TYPES?.length
        ? e.ATTACHMENT_MIME_TYPES
        : [...DEFAULT_ATTACHMENT_MIME_TYPES],
    },
    repairs: {
      customerApprovalCostThreshold: e.CUSTOMER_APPROVAL_COST_THRESHOLD,
    },
    publicApi: { cacheTtlSeconds: e.PUBLIC_CACHE_TTL_SECONDS },
    collaborators: {
      notificationWebhookUrl: e.NOTIFICATION_WEBHOOK_URL,
      scannerUrl: e.SCANNER_URL,
    },
  });
}
