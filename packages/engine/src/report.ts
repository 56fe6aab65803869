/**
 * @txledger/engine — CSV report sink.
 *
 * Writes the final account states, one row per client:
 *
 *   client,available,held,total,locked
 *   1,1.5000,0.0000,1.5000,false
 */

import { once } from "node:events";
import type { Writable } from "node:stream";
import type { AccountSnapshot } from "@txledger/types";

export const REPORT_HEADER = "client,available,held,total,locked";

export function formatReportRow(row: AccountSnapshot): string {
  return [
    String(row.client),
    row.available,
    row.held,
    row.total,
    String(row.locked),
  ].join(",");
}

/**
 * Write the header and every row, waiting for the stream to drain
 * whenever its buffer is full.
 */
export async function writeReport(
  rows: Iterable<AccountSnapshot>,
  output: Writable,
): Promise<void> {
  const write = async (line: string): Promise<void> => {
    if (!output.write(`${line}\n`)) {
      await once(output, "drain");
    }
  };

  await write(REPORT_HEADER);
  for (const row of rows) {
    await write(formatReportRow(row));
  }
}
