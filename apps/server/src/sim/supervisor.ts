// apps/server/src/sim/supervisor.ts
//
// Simulation lifecycle: at most one session, one generator per user.
//
// Locking: every read-modify-write of SupervisorState happens inside a
// synchronous section (no await between check and write). The event loop
// never interleaves two such sections, so they are the mutual exclusion
// for the session reference and its handle table. Generators run outside
// them and only ever see their own AbortSignal.

import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import type { SessionStatusV1 } from "@driftsim/contracts";

import { EmptyInputError } from "../errors";
import type { SampleStore } from "../store";
import { nowMs, toIso } from "../util";
import { CancellationScope, type CancelCause } from "./cancellation";
import type { SimConfigV1 } from "./config";
import { runGenerator, type GeneratorStats } from "./generator";
import { PRNG } from "./prng";

export type GenerationHandle = {
  userId: string;
  scope: CancellationScope;
  startedAt: number;
};

export type StartAck = {
  session_id: string;
  user_ids: string[];
  user_count: number;
  duration_ms: number;
  started_at: string;
  deadline_at: string;
};

export type StopAck = {
  stopped: number;
};

export type SupervisorDeps = {
  store: SampleStore;
  log: FastifyBaseLogger;
  config: SimConfigV1;
  seed?: () => number;
};

export class SimulationSession {
  readonly id = randomUUID();
  readonly handles = new Map<string, GenerationHandle>();
  readonly tasks: Promise<GeneratorStats | null>[] = [];
  private released = false;

  constructor(
    readonly root: CancellationScope,
    readonly userIds: readonly string[],
    readonly startedAt: number,
    readonly deadlineAt: number
  ) {}

  /** One-shot latch: true for the first caller only. */
  release(): boolean {
    if (this.released) return false;
    this.released = true;
    return true;
  }

  async settled(): Promise<void> {
    await Promise.all(this.tasks);
  }
}

export class SupervisorState {
  private current: SimulationSession | null = null;

  get session(): SimulationSession | null {
    return this.current;
  }

  install(session: SimulationSession): void {
    if (this.current) throw new Error(`session ${this.current.id} is still installed`);
    this.current = session;
  }

  /** Detach the current session; with `expected`, only if it is still current. */
  detach(expected?: SimulationSession): SimulationSession | null {
    const s = this.current;
    if (!s || (expected && s !== expected)) return null;
    this.current = null;
    return s;
  }

  activeUserIds(): string[] {
    return this.current ? Array.from(this.current.handles.keys()) : [];
  }
}

/** Drop empty ids (whitespace-only ids are valid) and duplicates, keeping order. */
export function filterUserIds(userIds: readonly string[], log: FastifyBaseLogger): string[] {
  const out = new Set<string>();
  for (const id of userIds) {
    if (id === "") {
      log.warn("skipping empty user id in start request");
      continue;
    }
    out.add(id);
  }
  return Array.from(out);
}

export class SessionSupervisor {
  readonly state = new SupervisorState();
  // released sessions whose generators may still be doing their final flush
  private readonly draining = new Set<SimulationSession>();

  constructor(private readonly deps: SupervisorDeps) {}

  async start(userIds: readonly string[]): Promise<StartAck> {
    const ids = filterUserIds(userIds, this.deps.log);
    if (!ids.length) throw new EmptyInputError("no valid user ids after filtering");

    const previous = this.teardown("superseded");
    const session = this.open(ids);

    // old generators have stopped generating already; wait for their last flush
    if (previous) await previous.settled();

    return {
      session_id: session.id,
      user_ids: ids,
      user_count: ids.length,
      duration_ms: this.deps.config.session_duration_ms,
      started_at: toIso(session.startedAt),
      deadline_at: toIso(session.deadlineAt),
    };
  }

  async stop(cause: CancelCause = "stopped"): Promise<StopAck> {
    const session = this.teardown(cause);
    if (!session) {
      this.deps.log.info("stop requested, but no simulation is active");
      return { stopped: 0 };
    }
    await session.settled();
    return { stopped: session.userIds.length };
  }

  /** Stop the live session and wait for every released session to drain. */
  async shutdown(): Promise<void> {
    await this.stop("shutdown");
    await Promise.all(Array.from(this.draining, (s) => s.settled()));
  }

  status(): SessionStatusV1 {
    const s = this.state.session;
    if (!s) return { active: false, session_id: null, user_ids: [], started_at: null, deadline_at: null };
    return {
      active: true,
      session_id: s.id,
      user_ids: this.state.activeUserIds(),
      started_at: toIso(s.startedAt),
      deadline_at: toIso(s.deadlineAt),
    };
  }

  private open(ids: string[]): SimulationSession {
    const { config, log, store } = this.deps;
    const startedAt = nowMs();
    const root = CancellationScope.root(config.session_duration_ms);
    const session = new SimulationSession(root, ids, startedAt, startedAt + config.session_duration_ms);
    this.state.install(session);

    for (const userId of ids) {
      const scope = root.child();
      session.handles.set(userId, { userId, scope, startedAt });
      const rng = new PRNG(this.deps.seed?.());
      const task = runGenerator(scope.signal, userId, { store, log, options: config, rng }).catch((err: unknown) => {
        log.error({ userId, err }, "generator failed");
        return null;
      });
      session.tasks.push(task);
    }

    root.onCancel((cause) => {
      if (cause === "deadline") this.expire(session);
    });

    log.info(
      { session_id: session.id, users: ids.length, duration_ms: config.session_duration_ms },
      "simulation session started"
    );
    return session;
  }

  // Deadline path: the root scope has already fired, so only bookkeeping is left.
  private expire(session: SimulationSession): void {
    if (!this.state.detach(session)) return;
    this.deps.log.info(
      { session_id: session.id, duration_ms: this.deps.config.session_duration_ms },
      "simulation duration reached, stopping automatically"
    );
    this.release(session, "deadline");
  }

  private teardown(cause: CancelCause): SimulationSession | null {
    const session = this.state.detach();
    if (!session) return null;
    this.release(session, cause);
    return session;
  }

  private release(session: SimulationSession, cause: CancelCause): void {
    if (!session.release()) return;
    if (!session.root.cancelled) session.root.cancel(cause);
    const stopped = session.handles.size;
    session.handles.clear();
    this.draining.add(session);
    // settled() never rejects: generator tasks catch their own failures
    void session.settled().then(() => this.draining.delete(session));
    this.deps.log.info({ session_id: session.id, cause, stopped }, "simulation session closed");
  }
}
