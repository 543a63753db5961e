import { loadConfig } from "./config";
import { createApp } from "./app";
import { SessionRepository } from "./database/sessionRepository";
import { RoundController } from "./services/roundController";
import { SessionRegistry } from "./services/sessionRegistry";

const config = loadConfig();

const repository = config.databaseUrl
  ? SessionRepository.connect(config.databaseUrl, config.nodeEnv)
  : null;
if (!repository) {
  console.warn("⚠️ DATABASE_URL is not set, sessions will not survive a restart");
}
const registry = new SessionRegistry({ store: repository ?? undefined });
const controller = new RoundController(registry);

registry.events.on("sessionExpired", ({ session }) => {
  if (config.debug) console.log(`⌛ Session ${session.code} expired`);
});

async function main(): Promise<void> {
  const loaded = await registry.loadFromStore();
  console.log(`📦 Loaded ${loaded} session(s) from the database`);

  await registry.sweepExpired();
  registry.startSweeper(config.sweepIntervalMs);

  const app = createApp(config, registry, controller);
  const server = app.listen(config.port, () => {
    console.log(`🚀 Server running on port ${config.port}`);
    console.log(`📊 Health check: http://localhost:${config.port}/api/health`);
  });

  const shutdown = () => {
    console.log("🛑 Shutting down");
    registry.stopSweeper();
    server.close(() => {
      if (!repository) process.exit(0);
      repository
        .close()
        .catch((error: unknown) => console.error("❌ Failed to close database:", error))
        .finally(() => process.exit(0));
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error("❌ Failed to start server:", error);
  process.exit(1);
});
