/**
 * @txledger/engine — CSV record source.
 *
 * Reads transaction records from CSV text, one record per line.
 *
 * Format:
 *   type, client, tx, amount
 *   deposit, 1, 1, 1.0
 *   dispute, 1, 1,
 *
 * - The first non-blank line is the header; columns may come in any order
 * - Cells are trimmed; missing trailing cells are empty
 * - Cells past the header's width must be empty
 * - Blank lines are skipped
 * - Any line that does not match the schema is fatal
 */

import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { z } from "zod";
import {
  MAX_CLIENT_ID,
  MAX_TX_ID,
  TRANSACTION_KINDS,
  isClientId,
  isFundsKind,
  isTxId,
} from "@txledger/types";
import type { TransactionRecord } from "@txledger/types";
import { AMOUNT_DECIMALS, isNonNegativeAmount } from "@txledger/ledger";
import { RecordSchemaError } from "./errors.js";

// =============================================================================
// Schema
// =============================================================================

const COLUMNS = ["type", "client", "tx", "amount"] as const;
const REQUIRED_COLUMNS = ["type", "client", "tx"] as const;

type Column = (typeof COLUMNS)[number];

const IntegerCell = z
  .string()
  .regex(/^\d+$/, "must be an unsigned integer")
  .transform(Number);

export const RecordRowSchema = z
  .object({
    type: z
      .string()
      .transform((value) => value.toLowerCase())
      .pipe(z.enum(TRANSACTION_KINDS)),
    client: IntegerCell.refine(isClientId, `must be at most ${String(MAX_CLIENT_ID)}`),
    tx: IntegerCell.refine(isTxId, `must be at most ${String(MAX_TX_ID)}`),
    amount: z.string(),
  })
  .superRefine((row, ctx) => {
    if (!isFundsKind(row.type) || isNonNegativeAmount(row.amount)) {
      return;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["amount"],
      message:
        row.amount === ""
          ? `is required for a ${row.type}`
          : `must be a non-negative decimal with at most ${String(AMOUNT_DECIMALS)} fractional digits, got "${row.amount}"`,
    });
  })
  .transform((row): TransactionRecord =>
    isFundsKind(row.type)
      ? { kind: row.type, client: row.client, tx: row.tx, amount: row.amount }
      : { kind: row.type, client: row.client, tx: row.tx },
  );

// =============================================================================
// Parsing
// =============================================================================

function splitCells(line: string): string[] {
  return line.split(",").map((cell) => cell.trim());
}

/**
 * Map each known column to its position in the header.
 */
function parseHeader(line: string, lineNumber: number): Map<Column, number> {
  const positions = new Map<Column, number>();

  splitCells(line).forEach((name, index) => {
    const column = COLUMNS.find((c) => c === name.toLowerCase());
    if (column !== undefined) {
      positions.set(column, index);
    }
  });

  for (const column of REQUIRED_COLUMNS) {
    if (!positions.has(column)) {
      throw new RecordSchemaError(lineNumber, `header is missing the "${column}" column`);
    }
  }

  return positions;
}

/**
 * Validate one data line against the header.
 */
function parseRecordLine(
  line: string,
  lineNumber: number,
  header: ReadonlyMap<Column, number>,
  columnCount: number,
): TransactionRecord {
  const cells = splitCells(line);

  if (cells.slice(columnCount).some((extra) => extra !== "")) {
    throw new RecordSchemaError(
      lineNumber,
      `expected at most ${String(columnCount)} fields, got ${String(cells.length)}`,
    );
  }

  const cell = (column: Column): string => {
    const index = header.get(column);
    return index === undefined ? "" : (cells[index] ?? "");
  };

  const result = RecordRowSchema.safeParse({
    type: cell("type"),
    client: cell("client"),
    tx: cell("tx"),
    amount: cell("amount"),
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue === undefined
      ? "invalid record"
      : `${issue.path.join(".")}: ${issue.message}`;
    throw new RecordSchemaError(lineNumber, detail);
  }

  return result.data;
}

// =============================================================================
// Source
// =============================================================================

/**
 * Yield validated records from a CSV stream, in order.
 *
 * @throws {RecordSchemaError} on the first line that does not match the schema
 */
export async function* readTransactionRecords(
  input: Readable,
): AsyncGenerator<TransactionRecord, void, undefined> {
  const lines = createInterface({ input, crlfDelay: Infinity });

  let lineNumber = 0;
  let header: Map<Column, number> | undefined;
  let columnCount = 0;

  try {
    for await (const line of lines) {
      lineNumber++;
      if (line.trim() === "") {
        continue;
      }

      if (header === undefined) {
        header = parseHeader(line, lineNumber);
        columnCount = splitCells(line).length;
        continue;
      }

      yield parseRecordLine(line, lineNumber, header, columnCount);
    }
  } finally {
    lines.close();
  }
}
