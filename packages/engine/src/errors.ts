/**
 * Fatal input errors.
 */

/**
 * A record that does not match the input schema.
 * Aborts the whole run; no report is written.
 */
export class RecordSchemaError extends Error {
  /** 1-based line number in the input. */
  public readonly line: number;

  constructor(line: number, message: string) {
    super(`Line ${String(line)}: ${message}`);
    this.name = "RecordSchemaError";
    this.line = line;
  }
}
