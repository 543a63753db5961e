import dotenv from "dotenv";

// Load environment variables
dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    console.warn(`⚠️ Ignoring invalid ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return parsed;
}

export interface AppConfig {
  port: number;
  frontendUrl: string;
  databaseUrl: string | null;
  debug: boolean;
  sweepIntervalMs: number;
  sessionTtlMs: number;
  nodeEnv: string;
}

export function loadConfig(): AppConfig {
  return {
    port: intFromEnv("PORT", 3002),
    frontendUrl: process.env.FRONTEND_URL || "http://localhost:5173",
    databaseUrl: process.env.DATABASE_URL || null,
    debug: process.env.DEBUG === "true",
    sweepIntervalMs: intFromEnv("SWEEP_INTERVAL_MS", 5 * 60 * 1000),
    sessionTtlMs: intFromEnv("SESSION_TTL_MINUTES", 7 * 24 * 60) * 60 * 1000,
    nodeEnv: process.env.NODE_ENV || "development",
  };
}
