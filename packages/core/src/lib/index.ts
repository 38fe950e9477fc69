import type { BasicBlock } from "./basic-block.js";
import type { CoverageResult, StateIntervals } from "./types.js";

export { BasicBlock, compareBasicBlocks } from "./basic-block.js";
export type { BasicBlockRecord } from "./basic-block.js";
export { BasicBlockSet } from "./basic-block-set.js";
export type { Disassembler, Logger, PathResolver, TraceSource } from "./collaborators.js";
export {
  ConfigError,
  DisassemblyUnavailableError,
  ModuleResolutionError,
  NoCoverageDataError,
  ReportAlreadyExistsError,
  ReportEncodingError,
} from "./errors.js";
export type {
  CoverageResult,
  CoverageStats,
  DisassemblyInfo,
  DisassemblyInfoRecord,
  ExecutionInterval,
  JsonCoverageReport,
  ModuleReport,
  RawDisassembly,
  StateId,
  StateIntervals,
  TraceCoverage,
} from "./types.js";

export interface BbCoverageToolsCoverage {
  /**
   * Computes the basic blocks covered by each state.
   *
   * A block is covered by an interval if the start or the end of the interval
   * falls inside the block.
   * The inputs are not mutated.
   * The computation is synchronous.
   *
   * @param intervalsByState Execution intervals grouped by state.
   * @param sortedBbs Basic blocks of the module, sorted by start address.
   * @return Covered blocks per state. States without covered blocks are absent.
   */
  computeCoverage(intervalsByState: StateIntervals, sortedBbs: readonly BasicBlock[]): CoverageResult;

  /**
   * Returns the index from which the blocks overlapping an interval starting
   * at `startAddr` must be scanned.
   *
   * @param startAddr Start address of the interval.
   * @param sortedBbs Basic blocks of the module, sorted by start address.
   * @return Index in `[0, sortedBbs.length]`.
   */
  findStartIndex(startAddr: number, sortedBbs: readonly BasicBlock[]): number;

  /**
   * Number of distinct blocks covered by at least one state.
   */
  countCoveredBasicBlocks(coverage: CoverageResult): number;
}

export interface BbCoverageTools extends BbCoverageToolsCoverage {
}
