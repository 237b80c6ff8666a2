import "dotenv/config";
import path from "path";
import { fileURLToPath } from "url";
import { loadOracleConfig } from "../shared/run_config.js";
import { createLogger } from "../shared/log.js";
import type { LedgerCommitment, PersistedRound } from "../shared/types.js";
import { PatternEntityExtractor } from "../extraction/extractor.js";
import { loadVocabulary } from "../vocabulary/loader.js";
import { loadRule } from "../rules/rule.js";
import { ReviewQueue } from "../arbitration/review_queue.js";
import { LedgerStore } from "../ledger/ledger_store.js";
import { JsonFileRecordStore } from "../storage/record_store.js";
import { parseLedgerCommitment, parsePersistedRound } from "../storage/schemas.js";
import { buildHmacNetwork } from "../round/network_factory.js";
import { RoundService } from "../round/round_service.js";
import { createApp } from "./app.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const ROOT = path.resolve(__dirname, "..", "..");

function main() {
  const config = loadOracleConfig();
  const log = createLogger("api");
  const storeDir = path.resolve(ROOT, config.storeDir);

  const reviews = new ReviewQueue();
  reviews.onRequest((r) => log.warn("HITL", `review ${r.requestId} pending for run ${r.runId}`));

  const network = buildHmacNetwork(undefined, { confidenceThreshold: config.confidenceThreshold });
  const rounds = new RoundService({
    extractor: new PatternEntityExtractor(),
    nodes: network.nodes,
    vocabulary: loadVocabulary(path.resolve(ROOT, config.vocabularyPath)),
    reviewer: reviews,
    ledger: new LedgerStore({
      backend: new JsonFileRecordStore<LedgerCommitment>(path.join(storeDir, "ledger"), parseLedgerCommitment),
      contractAddress: config.contractAddress,
      logger: log,
    }),
    recordStore: new JsonFileRecordStore<PersistedRound>(path.join(storeDir, "records"), parsePersistedRound),
    consensus: {
      threshold: config.consensusThreshold,
      policy: config.consensusPolicy,
      signer: network.signer,
    },
    nodeTimeoutMs: config.nodeTimeoutMs,
    rule: loadRule(path.resolve(ROOT, config.rulePath)),
    logger: log,
  });

  const app = createApp({ rounds, reviews });
  app.listen(config.port, () => {
    log.info("SERVER", `oracle API listening on port ${config.port}`);
  });
}

main();
