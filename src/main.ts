import { buildApplication } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { LOG_FILE } from "./env";
import { Topics } from "./domain/events/EventBus";

async function main() {
  const loggingHandle = initializeLogging(LOG_FILE);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }

  const app = await buildApplication();
  const { consistency, load } = await app.start();
  if (consistency.orphanArtifacts.length || consistency.orphanMetadata.length) {
    console.warn(
      `Orphans: ${consistency.orphanArtifacts.length} artifact(s), ${consistency.orphanMetadata.length} metadata record(s).`
    );
  }
  for (const failure of load.failures) {
    console.warn(`Not loaded: ${failure.name} (${failure.reason}) ${failure.detail}`);
  }

  process.on("SIGHUP", () => {
    app.bus.publish(Topics.ReloadRequested, { reason: "SIGHUP" });
  });

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    try {
      await app.shutdown();
    } catch (err) {
      console.warn("Shutdown failed:", err);
    }
  };

  process.on("SIGINT", () => {
    console.log("\nExiting…");
    shutdown().finally(() => {
      loggingHandle.shutdown();
      process.exit(0);
    });
  });

  // Keeps the process alive so SIGHUP can trigger reloads.
  setInterval(() => undefined, 1 << 30);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
