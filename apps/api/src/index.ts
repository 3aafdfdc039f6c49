/**
 * Curriflow API Server
 *
 * Fastify entry point. Boots the platform, registers routes, starts listening.
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import { closeDatabase, flushObservability, captureException } from "@curriflow/platform";
import { bootstrap } from "./bootstrap.js";
import { buildServer } from "./server.js";

async function main() {
  // 1. Bootstrap platform + domain
  const { config, engine } = await bootstrap();

  // 2. Build the HTTP server
  const app = await buildServer(config);

  // 3. Redeliver audit entries parked after a sink failure
  const retryTimer = setInterval(() => {
    engine.audit.retryPending().catch((err: unknown) => {
      captureException(err instanceof Error ? err : new Error(String(err)));
    });
  }, config.audit.retryIntervalMs);
  retryTimer.unref();

  // 4. Start server
  await app.listen({
    port: config.api.port,
    host: config.api.host,
  });

  console.log(`\n  Curriflow API running at http://localhost:${config.api.port}\n`);

  // 5. Graceful shutdown: stop accepting requests, let side effects finish,
  //    flush the audit backlog once more, then close connections
  const shutdown = async () => {
    console.log("\n[shutdown] Closing...");
    clearInterval(retryTimer);
    await app.close();
    await engine.drain();
    await engine.audit.retryPending();
    await flushObservability(2000);
    await closeDatabase();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      console.error("[shutdown] Failed:", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch(async (err) => {
  console.error("Fatal error:", err);
  captureException(err instanceof Error ? err : new Error(String(err)));
  await flushObservability(2000).catch((flushErr: unknown) => {
    console.error("Failed to flush observability:", flushErr);
  });
  process.exit(1);
});
