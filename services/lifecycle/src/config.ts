import { z } from "zod";

export const STORAGE_CLASSES = ["DEEP_ARCHIVE", "GLACIER", "GLACIER_IR", "STANDARD_IA", "STANDARD"] as const;
export type StorageClass = (typeof STORAGE_CLASSES)[number];

export const RESTORE_TIERS = ["Standard", "Bulk", "Expedited"] as const;
export type RestoreTier = (typeof RESTORE_TIERS)[number];

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback));

export const appConfigSchema = z.object({
  port: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(8080)),
  database: z.object({
    url: optionalText,
  }),
  lifecycle: z.object({
    retentionDays: positiveInt(180),
    restoreDays: positiveInt(5),
    restoreTier: z.preprocess(blankToUndefined, z.enum(RESTORE_TIERS).default("Standard")),
    fileServerRoot: optionalText,
    stagingDir: optionalText,
    transferTimeoutMs: positiveInt(30_000),
    chunkSizeBytes: positiveInt(64 * 1024),
  }),
  coldStorage: z.object({
    bucket: optionalText,
    region: optionalText,
    endpoint: optionalText,
    accessKeyId: optionalText,
    secretAccessKey: optionalText,
    prefix: optionalText,
    storageClass: z.preprocess(blankToUndefined, z.enum(STORAGE_CLASSES).default("DEEP_ARCHIVE")),
    requestTimeoutMs: positiveInt(60_000),
  }),
  remoteLibrary: z.object({
    siteId: z.preprocess(
      blankToUndefined,
      z
        .string()
        .trim()
        .refine((value) => value.split(",").length === 3, {
          message: "SHAREPOINT_SITE_ID must be in format: hostname,site-path,web-id",
        })
        .optional(),
    ),
    tenantId: optionalText,
    clientId: optionalText,
    clientSecret: optionalText,
    graphBaseUrl: text("https://graph.microsoft.com/v1.0"),
    authorityUrl: text("https://login.microsoftonline.com"),
    timeoutMs: positiveInt(30_000),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type LifecycleConfig = AppConfig["lifecycle"];
export type ColdStorageConfig = AppConfig["coldStorage"];
export type RemoteLibraryConfig = AppConfig["remoteLibrary"];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return appConfigSchema.parse({
    port: env.PORT,
    database: {
      url: env.DATABASE_URL,
    },
    lifecycle: {
      retentionDays: env.RETENTION_DAYS,
      restoreDays: env.RESTORE_DAYS,
      restoreTier: env.RESTORE_TIER,
      fileServerRoot: env.FILE_SERVER_ROOT,
      stagingDir: env.STAGING_DIR,
      transferTimeoutMs: env.TRANSFER_TIMEOUT_MS,
      chunkSizeBytes: env.CHUNK_SIZE_BYTES,
    },
    coldStorage: {
      bucket: env.ARCHIVE_BUCKET,
      region: env.AWS_REGION,
      endpoint: env.S3_ENDPOINT,
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      prefix: env.ARCHIVE_PREFIX,
      storageClass: env.S3_STORAGE_CLASS,
      requestTimeoutMs: env.S3_REQUEST_TIMEOUT_MS,
    },
    remoteLibrary: {
      siteId: env.SHAREPOINT_SITE_ID,
      tenantId: env.GRAPH_TENANT_ID,
      clientId: env.GRAPH_CLIENT_ID,
      clientSecret: env.GRAPH_CLIENT_SECRET,
      graphBaseUrl: env.GRAPH_BASE_URL,
      authorityUrl: env.GRAPH_AUTHORITY_URL,
      timeoutMs: env.GRAPH_TIMEOUT_MS,
    },
  });
}

export function isRemoteLibraryConfigured(config: RemoteLibraryConfig): boolean {
  return Boolean(config.siteId && config.tenantId && config.clientId && config.clientSecret);
}
