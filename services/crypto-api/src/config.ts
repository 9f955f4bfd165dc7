import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

const configSchema = z.object({
  PORT: z.coerce.number().int().default(8080),
  DATA_DIR: z.string().default("data"),
  // ":memory:" keeps everything in process
  DB_FILE: z.string().default("crypto-analyzer.db"),
  PRICES_DIR: z.string().default("data/prices"),
  LOAD_ON_STARTUP: booleanFlag.default("true"),
  CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(30),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
  TRUST_PROXY: booleanFlag.default("false"),
});

export type ApiConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new Error(
      `Invalid API configuration: ${JSON.stringify(issues, null, 2)}`,
    );
  }
  return result.data;
}
