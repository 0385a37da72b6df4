/**
 * Server configuration
 */

export type ServerConfig = {
  port: number;
  host: string;
  debug: boolean;
  metricsIntervalMs: number;
};

type Env = Record<string, string | undefined>;

const MAX_ENV_INT_LEN = 16;

function readEnvInt(
  env: Env,
  name: string,
  fallback: number,
  opts?: { min?: number; max?: number }
): number {
  const raw = env[name];
  if (raw === undefined) return fallback;
  const trimmed = raw.trim();
  if (trimmed === "") return fallback;
  if (trimmed.length > MAX_ENV_INT_LEN) {
    throw new Error(`Invalid ${name} (value too long)`);
  }
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${name}: ${trimmed}`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  const min = opts?.min ?? 0;
  const max = opts?.max ?? Number.MAX_SAFE_INTEGER;
  if (parsed < min || parsed > max) {
    throw new Error(`Invalid ${name}: ${parsed} (expected ${min}..${max})`);
  }
  return parsed;
}

export function loadConfig(env: Env): ServerConfig {
  return {
    port: readEnvInt(env, "RTUN_PORT", 7000, { min: 0, max: 65535 }),
    host: env.RTUN_HOST?.trim() || "0.0.0.0",
    debug: env.RTUN_DEBUG === "1",
    metricsIntervalMs: readEnvInt(env, "RTUN_METRICS_INTERVAL_MS", 0),
  };
}

export const config = loadConfig(process.env);
