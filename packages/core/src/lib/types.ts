import type { BasicBlock, BasicBlockRecord } from "./basic-block.js";
import type { BasicBlockSet } from "./basic-block-set.js";

/**
 * Identifier of one execution state (e.g. one symbolic execution path).
 */
export type StateId = number;

/**
 * Address range executed as one translation block by one state.
 */
export interface ExecutionInterval {
  readonly startAddr: number;
  readonly endAddr: number;
}

/**
 * Maps each state to the basic blocks it executed.
 *
 * A state is only present if it covered at least one block.
 */
export type CoverageResult = Map<StateId, BasicBlockSet>;

/**
 * Execution intervals of one module, grouped by state.
 */
export type StateIntervals = ReadonlyMap<StateId, readonly ExecutionInterval[]>;

/**
 * Execution intervals of every traced module, keyed by the module path
 * recorded in the trace.
 */
export type TraceCoverage = ReadonlyMap<string, StateIntervals>;

export interface DisassemblyInfo {
  /**
   * Invariant: sorted by `compareBasicBlocks`.
   */
  readonly bbs: readonly BasicBlock[];
  readonly baseAddr: number;
  readonly endAddr: number;
}

/**
 * Serialized form of `DisassemblyInfo` (`<module>.disas` files).
 */
export interface DisassemblyInfoRecord {
  bbs: BasicBlockRecord[];
  base_addr: number;
  end_addr: number;
}

/**
 * Disassembly result produced by an external disassembler.
 *
 * Basic blocks are in no particular order.
 */
export interface RawDisassembly {
  base_addr: number;
  end_addr: number;
  basic_blocks: BasicBlockRecord[];
}

export interface CoverageStats {
  total_basic_blocks: number;
  covered_basic_blocks: number;
}

/**
 * Aggregate JSON coverage report (`<module>_coverage.json`).
 */
export interface JsonCoverageReport {
  stats: CoverageStats;
  coverage: BasicBlockRecord[];
}

/**
 * Outcome of the report generation for one module.
 */
export interface ModuleReport {
  moduleName: string;
  modulePath: string;
  /**
   * JSON file, or drcov directory.
   */
  reportPath: string;
  totalBasicBlocks: number;
  coveredBasicBlocks: number;
}
