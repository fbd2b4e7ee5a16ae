import path from "node:path";
import { config } from "dotenv";
import { parseLogLevel, type LogLevel } from "@/lib/server/logger";

const TRUTHY = new Set(["1", "true", "yes", "on"]);

/** Loads KEY=value pairs from a .env file. Variables already set in the environment win. */
export function loadEnvFile(filePath: string = path.join(process.cwd(), ".env")): boolean {
  return !config({ path: filePath }).error;
}

function boolEnv(name: string, fallback = false): boolean {
  const raw = process.env[name];
  if (raw == null) return fallback;
  return TRUTHY.has(String(raw).trim().toLowerCase());
}

function numberEnv(name: string, fallback: number, opts: { min?: number; max?: number } = {}): number {
  const raw = process.env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) return fallback;
  const lower = opts.min ?? -Infinity;
  const upper = opts.max ?? Infinity;
  return Math.min(upper, Math.max(lower, n));
}

export function telegramToken(): string {
  return (
    process.env.TELEGRAM_BOT_TOKEN ||
    process.env.TELEGRAM_TOKEN ||
    ""
  ).trim();
}

export function telegramChatId(): string {
  return (process.env.TELEGRAM_CHAT_ID || "").trim();
}

export function telegramConfigured(): boolean {
  return Boolean(telegramToken() && telegramChatId());
}

export function tastyApiBaseUrl(): string {
  return (process.env.TASTY_API_BASE_URL || "https://api.tastyworks.com").trim();
}

export function tastySessionToken(): string {
  return (process.env.TASTY_SESSION_TOKEN || "").trim();
}

export function dryRunEnabled(): boolean {
  return boolEnv("MONITOR_DRY_RUN", false);
}

export function pollIntervalSec(): number {
  return Math.round(numberEnv("MONITOR_POLL_INTERVAL_SEC", 60, { min: 5 }));
}

export function monitorConcurrency(): number {
  return Math.round(numberEnv("MONITOR_CONCURRENCY", 4, { min: 1, max: 32 }));
}

export function fetchTimeoutMs(): number {
  return numberEnv("MONITOR_FETCH_TIMEOUT_MS", 8_000, { min: 100 });
}

export function notifyTimeoutMs(): number {
  return numberEnv("MONITOR_NOTIFY_TIMEOUT_MS", 8_000, { min: 100 });
}

export function minRequestSpacingMs(): number {
  return numberEnv("MONITOR_MIN_REQUEST_SPACING_MS", 250, { min: 0 });
}

export function riskFreeRate(): number {
  return numberEnv("MONITOR_RISK_FREE_RATE", 0.04, { min: -0.05, max: 0.5 });
}

export function storeFailureAlarmThreshold(): number {
  return Math.round(numberEnv("MONITOR_STORE_ALARM_CYCLES", 3, { min: 1 }));
}

export function monitorDbPath(): string {
  return process.env.MONITOR_DB_PATH || path.join(process.cwd(), "storage", "monitor.db");
}

export function watchlistPath(): string {
  return process.env.MONITOR_WATCHLIST_PATH || path.join(process.cwd(), "storage", "watchlist.json");
}

export function logLevel(): LogLevel {
  return parseLogLevel(process.env.LOG_LEVEL);
}

export function requiredEnvIssues(): string[] {
  const issues: string[] = [];

  if (!tastySessionToken()) {
    issues.push("Missing broker session. Set TASTY_SESSION_TOKEN.");
  }

  if (!dryRunEnabled() && !telegramConfigured()) {
    issues.push(
      "Telegram not configured. Set TELEGRAM_BOT_TOKEN (or TELEGRAM_TOKEN) and TELEGRAM_CHAT_ID, or MONITOR_DRY_RUN=true.",
    );
  }

  return issues;
}
