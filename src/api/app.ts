import express from "express";
import { z } from "zod";
import { OracleError } from "../shared/errors.js";
import type { PersistedRound } from "../shared/types.js";
import { ReviewDecisionSchema } from "../arbitration/arbitrator.js";
import type { ReviewQueue } from "../arbitration/review_queue.js";
import { recordDigest } from "../ledger/ledger_store.js";
import type { RoundService } from "../round/round_service.js";
import { StrictCanonicalRecordSchema } from "../storage/schemas.js";

const RunIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,64}$/, { message: "runId may only contain letters, digits, '_' and '-'" });

const StartRoundSchema = z.object({
  text: z.string().trim().min(1),
  runId: RunIdSchema.optional(),
});

const VerifyRecordSchema = z.object({ record: StrictCanonicalRecordSchema });

function issuesOf(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface AppDependencies {
  rounds: RoundService;
  reviews: ReviewQueue;
}

export function createApp({ rounds, reviews }: AppDependencies): express.Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  // ── POST /v1/rounds ──────────────────────────────────────────────
  app.post("/v1/rounds", async (req, res) => {
    const parsed = StartRoundSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: issuesOf(parsed.error) });

    try {
      const { text, runId } = parsed.data;
      if (runId && (rounds.get(runId) || (await rounds.deps.recordStore.has(runId)))) {
        return res.status(409).json({ error: `Run ${runId} already exists` });
      }
      const status = rounds.start(text, runId);
      res.status(202).json({ runId: status.runId, status: status.status });
    } catch (err) {
      const code = err instanceof OracleError && err.code === "RUN_EXISTS" ? 409 : 500;
      res.status(code).json({ error: errorMessage(err) });
    }
  });

  // ── GET /v1/rounds/:runId ────────────────────────────────────────
  app.get("/v1/rounds/:runId", async (req, res) => {
    const id = RunIdSchema.safeParse(req.params.runId);
    if (!id.success) return res.status(400).json({ error: issuesOf(id.error) });

    try {
      const runId = id.data;
      const live = rounds.get(runId);
      if (live) return res.json(live);

      const stored: PersistedRound | undefined = await rounds.deps.recordStore.find(runId);
      if (!stored) return res.status(404).json({ error: "Run not found" });
      res.json({ runId, status: "completed", result: stored });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // ── POST /v1/rounds/:runId/verify ────────────────────────────────
  app.post("/v1/rounds/:runId/verify", async (req, res) => {
    const id = RunIdSchema.safeParse(req.params.runId);
    if (!id.success) return res.status(400).json({ error: issuesOf(id.error) });
    const parsed = VerifyRecordSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: issuesOf(parsed.error) });

    try {
      const runId = id.data;
      const { ledger } = rounds.deps;
      const commitment = await ledger.get(runId);
      if (!commitment) return res.status(404).json({ error: "No ledger commitment for run" });

      const record = parsed.data.record;
      const computedDigest = recordDigest(record);
      const valid = record.runId === runId && (await ledger.verify(computedDigest, commitment));
      res.json({ valid, computedDigest, committedDigest: commitment.digest });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // ── GET /v1/reviews ──────────────────────────────────────────────
  app.get("/v1/reviews", (_req, res) => {
    res.json(
      reviews.list().map((r) => ({
        requestId: r.requestId,
        runId: r.runId,
        originalText: r.originalText,
        discrepancies: r.discrepancies,
        createdAt: r.createdAt,
      })),
    );
  });

  // ── POST /v1/reviews/:requestId ──────────────────────────────────
  app.post("/v1/reviews/:requestId", (req, res) => {
    const { requestId } = req.params;
    if (!reviews.get(requestId)) return res.status(404).json({ error: "Review request not found" });

    const parsed = ReviewDecisionSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: issuesOf(parsed.error) });

    try {
      reviews.submit(requestId, parsed.data);
      res.json({ requestId, status: "submitted" });
    } catch (err) {
      const status = err instanceof OracleError && err.code === "RECORD_NOT_FOUND" ? 404 : 500;
      res.status(status).json({ error: errorMessage(err) });
    }
  });

  return app;
}
