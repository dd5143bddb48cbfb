import { formatDefinitionId } from "@taskgraph/shared";
import { config } from "./config.js";
import { createApp } from "./app.js";
import { closePool } from "./db.js";
import { RetentionReaper } from "./retention/reaper.js";
import { createServices } from "./services.js";
import { CronTrigger } from "./triggers/cronTrigger.js";

async function main(): Promise<void> {
  const { graphs, runs, coordinator, orchestrator } = createServices(config);

  const trigger = new CronTrigger(
    graphs,
    async (definition) => {
      const run = await orchestrator.startRun(definition, { triggerSource: "schedule" });
      console.log(`scheduled run ${run.id} started for ${formatDefinitionId(definition)}`);
    },
    config.triggerRefreshMs
  );
  await trigger.start();

  const reaper = new RetentionReaper(
    runs,
    () => coordinator.activeRunIds(),
    config.runRetentionMs,
    config.reaperIntervalMs
  );
  reaper.start();

  const app = createApp({ config, orchestrator });
  const server = app.listen(config.apiPort, () => {
    console.log(`control-plane listening on port ${config.apiPort} (store: ${config.storeDriver})`);
  });

  const shutdown = async (): Promise<void> => {
    trigger.stop();
    reaper.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await coordinator.shutdown();
    await closePool();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown().catch((error) => {
      console.error("shutdown failed", error);
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown().catch((error) => {
      console.error("shutdown failed", error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
