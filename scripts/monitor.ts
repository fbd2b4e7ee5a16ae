import { TastytradeQuoteFetcher } from "@/lib/broker/tastytrade";
import { RateLimiter } from "@/lib/broker/rateLimiter";
import { loadWatchlist, syncWatchlist } from "@/lib/config/watchlist";
import { PollingOrchestrator } from "@/lib/engine/orchestrator";
import { describeError } from "@/lib/errors";
import { LogTransport, Notifier, type MessageTransport } from "@/lib/notify/notifier";
import { TelegramTransport } from "@/lib/notify/telegram";
import { createLogger } from "@/lib/server/logger";
import { PositionStore } from "@/lib/server/positionStore";
import {
  dryRunEnabled,
  fetchTimeoutMs,
  loadEnvFile,
  logLevel,
  minRequestSpacingMs,
  monitorConcurrency,
  monitorDbPath,
  notifyTimeoutMs,
  pollIntervalSec,
  requiredEnvIssues,
  riskFreeRate,
  storeFailureAlarmThreshold,
  tastyApiBaseUrl,
  tastySessionToken,
  telegramChatId,
  telegramToken,
  watchlistPath,
} from "@/lib/server/runtimeEnv";

async function main(): Promise<number> {
  const envFileLoaded = loadEnvFile();
  const logger = createLogger({ level: logLevel() });
  logger.debug("env_file", { loaded: envFileLoaded });

  const issues = requiredEnvIssues();
  if (issues.length > 0) {
    for (const issue of issues) logger.error("config_issue", { issue });
    return 1;
  }

  const store = PositionStore.open(monitorDbPath());
  const sync = syncWatchlist(store, loadWatchlist(watchlistPath()), logger);
  logger.info("watchlist_synced", {
    registered: sync.registered.length,
    rules_added: sync.rulesAdded,
    diverged: sync.diverged.length,
    rejected: sync.rejected.length,
  });

  const transport: MessageTransport = dryRunEnabled()
    ? new LogTransport(logger)
    : new TelegramTransport({ token: telegramToken(), chatId: telegramChatId(), timeoutMs: notifyTimeoutMs() });

  const orchestrator = new PollingOrchestrator({
    store,
    fetcher: new TastytradeQuoteFetcher({
      baseUrl: tastyApiBaseUrl(),
      sessionToken: tastySessionToken(),
      timeoutMs: fetchTimeoutMs(),
      rateLimiter: new RateLimiter(minRequestSpacingMs()),
    }),
    notifier: new Notifier({ transport, logger }),
    logger,
    intervalMs: pollIntervalSec() * 1000,
    concurrency: monitorConcurrency(),
    riskFreeRate: riskFreeRate(),
    storeFailureAlarmThreshold: storeFailureAlarmThreshold(),
  });

  const shutdown = (signal: string) => {
    logger.info("shutdown_requested", { signal });
    orchestrator.stop().catch((err: unknown) => logger.error("shutdown_failed", describeError(err)));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGUSR1", () => (orchestrator.isPaused ? orchestrator.resume() : orchestrator.pause()));

  try {
    await orchestrator.start();
  } finally {
    store.close();
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(JSON.stringify({ ts: new Date().toISOString(), level: "error", event: "fatal", ...describeError(err) }));
    process.exitCode = 1;
  });
