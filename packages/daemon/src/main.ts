import { formatState } from "@homesync/shared";
import { loadConfig } from "./config.js";
import { createRuntime, type Runtime } from "./index.js";
import { DemoActivity } from "./devices/providers/demo-home.js";

/** The parts of `process` the daemon touches. */
export interface DaemonProcess {
  env: NodeJS.ProcessEnv;
  once(event: "SIGINT" | "SIGTERM", listener: () => void): unknown;
  exit(code: number): void;
}

export async function main(proc: DaemonProcess = process): Promise<Runtime> {
  console.log("homesync: Z-Wave sensors and WeMo switches");
  console.log("=========================================\n");

  // 1. Load config
  const config = loadConfig(proc.env);

  // 2. Wire registries, adapters and entity manager
  const runtime = await createRuntime(config);
  console.log(`[Init] ${runtime.entityManager.getEntities().length} entities registered`);

  // 3. Log every pushed change
  runtime.eventBus.on("entity:updated", ({ snapshot }) => {
    const unit = snapshot.unit ? ` ${snapshot.unit}` : "";
    console.log(`[Entity] ${snapshot.entityId} → ${formatState(snapshot.state)}${unit}`);
  });

  // 4. Simulated device activity
  const activity = new DemoActivity(runtime.zwaveNetwork, runtime.wemoNetwork, config.simulation.intervalMs);
  activity.start();

  console.log("\n✅ homesync running");
  console.log("   Press Ctrl+C to stop\n");

  // 5. Graceful shutdown, once, whichever signal comes first
  let shuttingDown = false;
  const shutdown = () => {
    if (shuttingDown) return;
    shuttingDown = true;

    console.log("\n\nShutting down...");
    activity.stop();
    runtime
      .shutdown()
      .then(() => {
        console.log("Goodbye!");
        proc.exit(0);
      })
      .catch((err) => {
        console.error("Shutdown failed:", err);
        proc.exit(1);
      });
  };

  proc.once("SIGINT", shutdown);
  proc.once("SIGTERM", shutdown);

  return runtime;
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}
