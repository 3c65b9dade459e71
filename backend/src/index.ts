import { buildApp } from "./app.js";
import { loadConfig } from "./config/index.js";
import { createLogger, setLogLevel } from "./logger.js";
import { createRuntime } from "./runtime.js";

const log = createLogger("main");

async function main(): Promise<void> {
  // ─── Load Configuration ───────────────────────────────
  const config = loadConfig();
  setLogLevel(config.logging.level);
  log.info(
    {
      stateDir: config.orchestrator.state_dir,
      leases: config.orchestrator.lease_backend,
      partitions: config.bus.partitions,
      dryRun: config.execution.dry_run,
    },
    "configuration loaded",
  );

  // ─── Wire Components ──────────────────────────────────
  const runtime = await createRuntime(config);

  // ─── Build App ────────────────────────────────────────
  const app = await buildApp(
    {
      auth: config.auth,
      cors: config.server.cors_origin,
      logLevel: config.logging.level,
    },
    {
      orchestrator: runtime.orchestrator,
      health: runtime.health,
      registry: runtime.registry,
      memory: runtime.memory,
      notifications: runtime.notifications,
    },
  );

  // ─── Start Agents ─────────────────────────────────────
  await runtime.start();

  // ─── Start Server ─────────────────────────────────────
  await app.listen({
    port: config.server.port,
    host: config.server.host,
  });
  log.info(`IntentFlow API listening on http://${config.server.host}:${config.server.port}`);

  // ─── Graceful Shutdown ────────────────────────────────
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, "shutting down");
    await app.close();
    await runtime.stop();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      log.error({ err }, "shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  log.fatal({ err }, "fatal error");
  process.exit(1);
});
