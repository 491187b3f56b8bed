import { z } from "zod";

const RetrySchema = z.object({
  attempts: z.coerce.number().int().min(1).max(10).default(3),
  baseDelayMs: z.coerce.number().int().min(0).default(500),
  maxDelayMs: z.coerce.number().int().min(0).default(8000),
  factor: z.coerce.number().min(1).default(2)
});

const DesignSchema = z.object({
  apiToken: z.string({ required_error: "is required" }).min(1, "is required"),
  baseUrl: z.string().url().default("https://api.figma.com"),
  fileKey: z.string().min(1).optional(),
  placeholderUrl: z.string().url().optional(),
  format: z.enum(["png", "jpg", "svg", "pdf"]).default("png"),
  scale: z.coerce.number().min(0.01).max(4).default(2)
});

const DocsSchema = z.object({
  apiToken: z.string({ required_error: "is required" }).min(1, "is required"),
  username: z.string({ required_error: "is required" }).min(1, "is required"),
  baseUrl: z.string({ required_error: "is required" }).url(),
  spaceKey: z.string({ required_error: "is required" }).min(1, "is required"),
  parentPageId: z.string().regex(/^\d+$/, "must be a numeric page id").optional()
});

const BaseConfigSchema = z.object({
  design: DesignSchema,
  schemaDir: z.string().min(1).default("./schemas"),
  stagingDir: z.string().min(1).default("./build"),
  stateFile: z.string().min(1).optional(),
  templatesDir: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().min(1).max(32).default(1),
  retry: RetrySchema.default({})
});

/** Full pipeline: both the design tool and the documentation platform. */
export const SyncConfigSchema = BaseConfigSchema.extend({
  docs: DocsSchema
});

/** Dry runs and schema validation do not talk to the documentation platform. */
export const LocalConfigSchema = BaseConfigSchema.extend({
  docs: DocsSchema.partial().optional()
});

/** Offline schema validation needs no credentials at all. */
export const ValidateConfigSchema = BaseConfigSchema.pick({ schemaDir: true, stagingDir: true, stateFile: true });

export type SyncConfig = z.infer<typeof SyncConfigSchema>;
export type LocalConfig = z.infer<typeof LocalConfigSchema>;
export type ValidateConfig = z.infer<typeof ValidateConfigSchema>;
