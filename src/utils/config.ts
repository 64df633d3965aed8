import { z } from "zod";
import { formatZodIssues } from "./errors";

/**
 * Environment configuration, validated once at startup
 */
const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  SCHEMA_PATH: z.string().min(1).default("data/senior_care_base.json"),
  // Empty string disables the overlay
  OVERLAY_PATH: z.string().default("data/senior_care_overlay.json"),
});

export interface AppConfig {
  port: number;
  schemaPath: string;
  overlayPath: string | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatZodIssues(parsed.error).join("; ")}`);
  }
  const { PORT, SCHEMA_PATH, OVERLAY_PATH } = parsed.data;
  return {
    port: PORT,
    schemaPath: SCHEMA_PATH,
    overlayPath: OVERLAY_PATH.trim() === "" ? null : OVERLAY_PATH,
  };
}
