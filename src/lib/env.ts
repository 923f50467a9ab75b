import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadEnvFile } from "dotenv";
import { z } from "zod";
import { ConfigError } from "@/lib/errors";

const shouldLoadLocalDotenv = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

if (shouldLoadLocalDotenv) {
  const envFiles = [".env", ".env.local"];
  for (const file of envFiles) {
    const path = resolve(process.cwd(), file);
    if (existsSync(path)) {
      loadEnvFile({ path, override: true, quiet: true });
    }
  }
}

const envSchema = z.object({
  SCREENER_DATA_DIR: z.string().min(1).default("./data"),
  SCREENER_CONFIG_PATH: z.string().min(1).default("./screening.config.json"),
  SCREENER_OUTPUT_PATH: z.string().min(1).optional(),
  SCREENER_PREVIEW_ROWS: z.coerce.number().int().positive().default(20),
});

export type ScreenerEnv = z.infer<typeof envSchema>;

export function readEnv(source: NodeJS.ProcessEnv = process.env): ScreenerEnv {
  const parsed = envSchema.safeParse({
    SCREENER_DATA_DIR: source.SCREENER_DATA_DIR || undefined,
    SCREENER_CONFIG_PATH: source.SCREENER_CONFIG_PATH || undefined,
    SCREENER_OUTPUT_PATH: source.SCREENER_OUTPUT_PATH || undefined,
    SCREENER_PREVIEW_ROWS: source.SCREENER_PREVIEW_ROWS || undefined,
  });

  if (!parsed.success) {
    throw new ConfigError(
      "Invalid environment variables",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  return {
    ...parsed.data,
    SCREENER_DATA_DIR: resolve(parsed.data.SCREENER_DATA_DIR),
    SCREENER_CONFIG_PATH: resolve(parsed.data.SCREENER_CONFIG_PATH),
    SCREENER_OUTPUT_PATH: parsed.data.SCREENER_OUTPUT_PATH ? resolve(parsed.data.SCREENER_OUTPUT_PATH) : undefined,
  };
}
