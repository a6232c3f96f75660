// apps/server/src/routes/simulation.ts
//
// POST /start            { user_ids: string[] }
// POST /stop
// GET  /user/:userId     ?min=0..1&max=0..1
// GET  /status
// GET  /api/sim/config

import type { FastifyInstance } from "fastify";
import type { ZodError } from "zod";
import {
  FetchWindowV1Schema,
  StartRequestV1Schema,
  type UserDataResponseV1,
} from "@driftsim/contracts";

import { DriftError, StoreUnavailableError, ValidationError, errorMessage } from "../errors";
import { toWire } from "../sim/codec";
import type { LoadedSimConfig } from "../sim/config";
import type { Retriever } from "../sim/retriever";
import type { SessionSupervisor } from "../sim/supervisor";
import { parseFractionParam } from "../util";

export type SimulationRouteDeps = {
  supervisor: SessionSupervisor;
  retriever: Retriever;
  sim: LoadedSimConfig;
};

function zodIssues(e: ZodError): string[] {
  return e.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
}

function errorBody(e: DriftError, message: string = e.message) {
  return { ok: false, code: e.code, error: message };
}

export function registerSimulationRoutes(app: FastifyInstance, deps: SimulationRouteDeps): void {
  const { supervisor, retriever, sim } = deps;

  app.post("/start", async (req, reply) => {
    const parsed = StartRequestV1Schema.safeParse(req.body);
    if (!parsed.success) {
      const err = new ValidationError(zodIssues(parsed.error));
      return reply.code(err.status).send(errorBody(err));
    }

    req.log.info({ requested: parsed.data.user_ids.length }, "received /start request");
    try {
      const ack = await supervisor.start(parsed.data.user_ids);
      return reply.send({
        ok: true,
        ...ack,
        message: `Simulation started for ${ack.user_count} users. Will run for approximately ${ack.duration_ms}ms.`,
      });
    } catch (e) {
      if (e instanceof ValidationError) return reply.code(e.status).send(errorBody(e));
      throw e;
    }
  });

  app.post("/stop", async (_req, reply) => {
    const { stopped } = await supervisor.stop();
    return reply.send({ ok: true, stopped, message: "All active simulations stopped." });
  });

  app.get<{ Params: { userId: string }; Querystring: Record<string, unknown> }>(
    "/user/:userId",
    async (req, reply) => {
      const userId = req.params.userId;
      if (!userId) return reply.code(400).send(errorBody(new ValidationError(["user id required"])));

      let min: number;
      let max: number;
      try {
        min = parseFractionParam(req.query.min, "min", 0);
        max = parseFractionParam(req.query.max, "max", 1);
      } catch (e) {
        return reply.code(400).send(errorBody(new ValidationError([errorMessage(e)])));
      }

      const win = FetchWindowV1Schema.safeParse({ min, max });
      if (!win.success) return reply.code(400).send(errorBody(new ValidationError(zodIssues(win.error))));

      req.log.info({ userId, min: win.data.min, max: win.data.max }, "fetching user samples");

      try {
        const samples = await retriever.fetch(userId, win.data.min, win.data.max);
        if (!samples.length) {
          return reply.code(404).send({ ok: false, error: `No data found for user ${userId} within the specified range` });
        }
        const body: UserDataResponseV1 = { user_id: userId, data: samples.map(toWire) };
        return reply.send(body);
      } catch (e) {
        if (e instanceof StoreUnavailableError) {
          req.log.error({ userId, err: e }, "retrieval failed");
          return reply.code(e.status).send(errorBody(e, "retrieval failed"));
        }
        throw e;
      }
    }
  );

  app.get("/status", async (_req, reply) => reply.send(supervisor.status()));

  app.get("/api/sim/config", async (_req, reply) => reply.send({ ssot_hash: sim.ssot_hash, config: sim.config }));
}
