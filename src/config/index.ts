import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const csvList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .default("info"),
  // file transports are only attached when a directory is given
  LOG_DIR: z.string().min(1).optional(),

  BODY_LIMIT: z.string().default("1mb"),
  MAX_FILE_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .default(5 * 1024 * 1024),

  MAX_FIELD_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .default(1024 * 1024),

  CORS_ORIGINS: csvList.default(""),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(200),
  SLOW_DOWN_AFTER: z.coerce.number().int().positive().default(100),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);
if (!parsed.success) {
  const problems = parsed.error.issues
    .map((i) => `${i.path.join(".")}: ${i.message}`)
    .join("; ");
  throw new Error(`Invalid environment configuration: ${problems}`);
}

const config: AppConfig = parsed.data;
export default config;
