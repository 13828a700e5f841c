import dotenv from "dotenv";
import { join, dirname, resolve } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(join(__dirname, "..", "..", ".."));

// Load .env from project root so it works when tsx runs from either root
dotenv.config({ path: join(PROJECT_ROOT, ".env") });

function str(name: string, defaultValue: string): string {
  const v = process.env[name];
  return (typeof v === "string" && v.trim()) || defaultValue;
}
function num(name: string, defaultValue: number): number {
  const v = process.env[name];
  if (v === undefined || v === "") return defaultValue;
  const n = Number(v);
  return Number.isFinite(n) ? n : defaultValue;
}

/** Loaded once at startup. Use this instead of process.env everywhere. */
export const env = {
  NODE_ENV: str("NODE_ENV", "development"),
  REDIS_URL: str("REDIS_URL", "redis://localhost:6379"),
  /** Namespace for the delayed schedule keys (compatible with resque-scheduler's "resque"). */
  REDIS_PREFIX: str("REDIS_PREFIX", "resque"),
  /** Seconds to sleep between drain passes; fractions allowed. */
  SCHEDULER_INTERVAL: num("SCHEDULER_INTERVAL", 5),
} as const;

export const VERSION = "1.0.0";
