/**
 * RoundService: tracks rounds started through the API.
 *
 * Rounds run in the background; arbitration may park a round on the
 * review queue until a human answers. Failures are kept on the run
 * status and logged, never dropped.
 */

import { v4 as uuidv4 } from "uuid";
import { DuplicateRunError } from "../shared/errors.js";
import { createLogger, type Logger } from "../shared/log.js";
import type { PersistedRound } from "../shared/types.js";
import { runOracleRound, type RoundDependencies, type RoundResult } from "./orchestrator.js";

export type RunState = "running" | "completed" | "failed";

export interface RunStatus {
  runId: string;
  status: RunState;
  startedAt: string;
  completedAt?: string;
  result?: PersistedRound;
  error?: { code?: string; message: string };
}

export class RoundService {
  readonly deps: RoundDependencies;
  private runs = new Map<string, RunStatus>();
  private inflight = new Map<string, Promise<RoundResult | undefined>>();
  private log: Logger;

  constructor(deps: RoundDependencies) {
    this.deps = deps;
    this.log = deps.logger ?? createLogger();
  }

  /**
   * Start a round and return its id immediately.
   */
  start(text: string, runId: string = uuidv4()): RunStatus {
    if (this.runs.has(runId)) {
      throw new DuplicateRunError(runId);
    }
    const status: RunStatus = { runId, status: "running", startedAt: new Date().toISOString() };
    this.runs.set(runId, status);

    const task = runOracleRound({ text, runId }, this.deps).then(
      (result) => {
        status.status = "completed";
        status.completedAt = new Date().toISOString();
        status.result = result.persisted;
        return result;
      },
      (err: unknown) => {
        status.status = "failed";
        status.completedAt = new Date().toISOString();
        const code = typeof err === "object" && err !== null && "code" in err ? String(err.code) : undefined;
        status.error = { code, message: err instanceof Error ? err.message : String(err) };
        this.log.error("ROUND", `run ${runId} failed: ${status.error.message}`);
        return undefined;
      },
    );
    this.inflight.set(runId, task);
    void task.finally(() => this.inflight.delete(runId));
    return { ...status };
  }

  get(runId: string): RunStatus | undefined {
    const status = this.runs.get(runId);
    return status ? { ...status } : undefined;
  }

  /** Resolves once the run has settled. */
  async waitFor(runId: string): Promise<RunStatus | undefined> {
    await this.inflight.get(runId);
    return this.get(runId);
  }
}
