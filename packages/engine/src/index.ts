/**
 * @txledger/engine — Package public API.
 *
 * The command-line entry point lives in main.ts; everything it wires
 * together is exported here for embedding and tests.
 */

export { runEngine, logRejection } from "./engine.js";
export type { RunEngineOptions } from "./engine.js";
export { readTransactionRecords, RecordRowSchema } from "./csv-source.js";
export { writeReport, formatReportRow, REPORT_HEADER } from "./report.js";
export { RecordSchemaError } from "./errors.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
