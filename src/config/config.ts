import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false"])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === "true"));

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  PORT: z.coerce.number().int().positive().default(3000),

  // Sh-Data rendering
  SH_DATA_EXTENSIONS: z
    .string()
    .default("service-settings")
    .transform((value) =>
      value
        .split(",")
        .map((name) => name.trim())
        .filter(Boolean),
    ),
  SH_DATA_PRETTY_PRINT: booleanFlag(true),
  SH_DATA_INDENT: z.coerce.number().int().min(0).max(8).default(4),
  SH_DATA_VERIFY_OUTPUT: booleanFlag(true),

  // Logging
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
});

export type EnvConfig = z.output<typeof envSchema>;

const parseEnv = (): EnvConfig => {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const invalid = error.issues
        .map((issue) => issue.path.join("."))
        .join(", ");

      throw new Error(`Missing or invalid environment variables: ${invalid}`);
    }
    throw error;
  }
};

export const config = parseEnv();
