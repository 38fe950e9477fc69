import type { RawDisassembly, TraceCoverage } from "./types.js";

/**
 * Disassembler backend (IDA Pro, Radare2, Binary Ninja, ...).
 *
 * Implementations throw `DisassemblyUnavailableError` when the module cannot
 * be disassembled.
 */
export interface Disassembler {
  readonly name: string;

  disassemble(modulePath: string): Promise<RawDisassembly>;
}

/**
 * Source of the execution intervals recorded during a run.
 */
export interface TraceSource {
  /**
   * @param traceRoot Directory holding the trace files of the run.
   * @return Intervals grouped by module path, then by state.
   */
  getExecutionIntervals(traceRoot: string): Promise<TraceCoverage>;
}

/**
 * Finds the on-disk location of a module referenced by the trace data.
 */
export interface PathResolver {
  /**
   * @throws ModuleResolutionError If the module cannot be located.
   */
  resolveModulePath(searchPaths: readonly string[], moduleName: string): Promise<string>;
}

/**
 * Logging capability injected into every component.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}
