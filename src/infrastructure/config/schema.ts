import { z } from "zod";

export const LogLevelSchema = z
  .enum(["silent", "error", "warn", "info", "debug"])
  .default("error");

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema,
  /** Comma-separated tag names kept in the output. */
  allow: z.string().default(""),
  squeeze: z.boolean().default(true),
  stripComments: z.boolean().default(false),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
