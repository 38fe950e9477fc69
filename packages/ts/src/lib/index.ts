import type { BbCoverageTools } from "@bb-coverage/core";
import { computeCoverage, countCoveredBasicBlocks, findStartIndex } from "./coverage.js";

export { BasicBlockCoverage } from "./command.js";
export type { BasicBlockCoverageOptions } from "./command.js";
export { CoverageConfigSchema, getTraceRoot, loadCoverageConfig, parseCoverageConfig } from "./config.js";
export type {
  CommandDisassemblerConfig,
  CoverageConfig,
  CoverageConfigInput,
  DisassemblerConfig,
  ExportDisassemblerConfig,
  ReportFormat,
} from "./config.js";
export { computeCoverage, countCoveredBasicBlocks, findStartIndex, isSortedByStart } from "./coverage.js";
export { CommandDisassembler, createDisassembler, ExportFileDisassembler, parseRawDisassembly } from "./disassemblers.js";
export { DisassemblyCache, toDisassemblyInfo } from "./disassembly-cache.js";
export type { DisassemblyCacheOptions } from "./disassembly-cache.js";
export {
  createDrcovDirectory,
  DRCOV_BB_ENTRY_SIZE,
  DRCOV_DIR_NAME,
  encodeDrcov,
  getDrcovFileName,
  writeDrcovFiles,
  writeDrcovReport,
} from "./drcov.js";
export { getJsonReportFileName, toJsonReport, writeJsonReport } from "./json-report.js";
export { createConsoleLogger, nullLogger } from "./logger.js";
export type { ConsoleLoggerOptions, LogLevel } from "./logger.js";
export { FileSystemPathResolver } from "./path-resolver.js";

/**
 * Coverage engine, as consumed by the shared test suite.
 */
export const bbCoverageTools: BbCoverageTools = {
  computeCoverage,
  findStartIndex,
  countCoveredBasicBlocks,
};
