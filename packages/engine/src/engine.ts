/**
 * @txledger/engine — Run orchestration.
 *
 * Wires the CSV source, the transaction processor and the report sink
 * for one pass over one input stream. Separated from main.ts so tests
 * can drive a full run with in-memory streams.
 */

import type { Readable, Writable } from "node:stream";
import type { Logger } from "pino";
import {
  AccountStore,
  TransactionLedger,
  TransactionProcessor,
} from "@txledger/ledger";
import type { ProcessingSummary, TransactionError } from "@txledger/ledger";
import { readTransactionRecords } from "./csv-source.js";
import { writeReport } from "./report.js";

export interface RunEngineOptions {
  readonly input: Readable;
  readonly output: Writable;
  readonly logger: Logger;
}

/**
 * Log one rejected record on the diagnostics channel.
 */
export function logRejection(logger: Logger, error: TransactionError): void {
  logger.warn(
    {
      kind: error.kind,
      tx: error.tx,
      client: error.client,
      code: error.code,
    },
    `transaction rejected: ${error.message}`,
  );
}

/**
 * Process every record from `input`, then write the report to `output`.
 *
 * A RecordSchemaError (or any error other than a rejected record)
 * propagates before anything is written to `output`.
 */
export async function runEngine(options: RunEngineOptions): Promise<ProcessingSummary> {
  const { input, output, logger } = options;

  const ledger = new TransactionLedger();
  const accounts = new AccountStore();
  const processor = new TransactionProcessor(ledger, accounts, {
    onRejected: (error) => logRejection(logger, error),
  });

  const summary = await processor.process(readTransactionRecords(input));

  await writeReport(accounts.snapshotAll(), output);

  logger.info(
    { ...summary, accounts: accounts.size, transactions: ledger.size },
    "run complete",
  );

  return summary;
}
