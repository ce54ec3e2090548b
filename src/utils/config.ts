import { configSchema } from "./validations";
import { DB_NAME, StartupFault } from "./data-helpers";

export interface AppConfig {
  mongoUri: string;
  dbName: string;
  port: number;
  rateLimitMs: number;
  cacheTtlMs: number;
  storeTimeoutMs: number;
  rateLimitSweepMs: number;
}

export const loadConfig = (
  env: Record<string, string | undefined> = process.env
): AppConfig => {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StartupFault(
      issue ? `${issue.path.join(".")}: ${issue.message}` : "Invalid configuration"
    );
  }

  const values = parsed.data;
  return {
    mongoUri: values.MONGODB_URI,
    dbName: values.MONGODB_DB ?? DB_NAME,
    port: values.PORT,
    rateLimitMs: values.RATE_LIMIT_MS,
    cacheTtlMs: values.CACHE_TTL_MS,
    storeTimeoutMs: values.STORE_TIMEOUT_MS,
    rateLimitSweepMs: values.RATE_LIMIT_SWEEP_MS,
  };
};
