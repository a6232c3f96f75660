// apps/server/src/server.ts
//
// Process entry: env -> simulator config -> store -> HTTP.

import { buildApp } from "./app";
import { loadEnv, readServerEnv } from "./env";
import { loadSimConfig } from "./sim/config";
import { makeStoreFromEnv } from "./store";

loadEnv();

async function main(): Promise<void> {
  const env = readServerEnv();
  const sim = loadSimConfig();
  const store = await makeStoreFromEnv(env);

  const { app } = buildApp({ store, sim, logger: { level: env.logLevel } });
  app.log.info({ source: sim.source, ssot_hash: sim.ssot_hash }, "simulator config loaded");

  let closing = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (closing) return;
    closing = true;
    app.log.info({ signal }, "received shutdown signal, stopping simulations and closing store");
    // onClose hook stops the supervisor before the store goes away
    await app.close();
    await store.close();
    app.log.info("shutdown complete");
    process.exit(0);
  };
  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.on(sig, () => {
      shutdown(sig).catch((err) => {
        app.log.error(err);
        process.exit(1);
      });
    });
  }

  await app.listen({ port: env.port, host: env.host });
  app.log.info({ driver: store.driver, db_path: env.dbDriver === "sqlite" ? env.dbPath : undefined }, "store ready");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
