import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { MAX_USER_ID_LENGTH } from "@driftsim/contracts";

import { registerSimulationRoutes } from "./routes/simulation";
import type { LoadedSimConfig } from "./sim/config";
import { Retriever } from "./sim/retriever";
import { SessionSupervisor } from "./sim/supervisor";
import type { SampleStore } from "./store";

export type BuildAppOptions = {
  store: SampleStore;
  sim: LoadedSimConfig;
  logger?: FastifyServerOptions["logger"];
};

export type DriftApp = {
  app: FastifyInstance;
  supervisor: SessionSupervisor;
  retriever: Retriever;
};

export function buildApp(opts: BuildAppOptions): DriftApp {
  const app = Fastify({
    logger: opts.logger ?? true,
    // percent-encoding may triple an id's length in the path
    maxParamLength: MAX_USER_ID_LENGTH * 3,
  });

  const supervisor = new SessionSupervisor({ store: opts.store, log: app.log, config: opts.sim.config });
  const retriever = new Retriever({ store: opts.store, log: app.log });

  registerSimulationRoutes(app, { supervisor, retriever, sim: opts.sim });
  app.get("/healthz", async (_req, reply) => reply.send({ ok: true, store: opts.store.driver }));

  // generators must not outlive the HTTP server
  app.addHook("onClose", async () => {
    await supervisor.shutdown();
  });

  return { app, supervisor, retriever };
}
