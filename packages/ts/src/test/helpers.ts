import {
  DisassemblyUnavailableError,
  Disassembler,
  Logger,
  ModuleResolutionError,
  PathResolver,
  RawDisassembly,
  TraceCoverage,
  TraceSource,
} from "@bb-coverage/core";
import fs from "fs";
import os from "os";
import sysPath from "path";
import { LogLevel } from "../lib/index.js";

export interface LogEntry {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string, data?: Record<string, unknown>): void {
    this.entries.push({level: "debug", message, data});
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.entries.push({level: "info", message, data});
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.entries.push({level: "warn", message, data});
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.entries.push({level: "error", message, data});
  }

  messages(level: LogLevel): string[] {
    return this.entries
      .filter((entry: LogEntry): boolean => entry.level === level)
      .map((entry: LogEntry): string => entry.message);
  }
}

/**
 * Disassembler returning fixed results and counting its calls.
 */
export class FakeDisassembler implements Disassembler {
  readonly name: string = "fake";
  readonly calls: string[] = [];
  private readonly results: ReadonlyMap<string, RawDisassembly>;

  constructor(results: ReadonlyMap<string, RawDisassembly>) {
    this.results = results;
  }

  async disassemble(modulePath: string): Promise<RawDisassembly> {
    this.calls.push(modulePath);
    const moduleName: string = sysPath.basename(modulePath);
    const result: RawDisassembly | undefined = this.results.get(moduleName);
    if (result === undefined) {
      throw new DisassemblyUnavailableError(moduleName);
    }
    return result;
  }
}

export class FakeTraceSource implements TraceSource {
  readonly traceRoots: string[] = [];
  private readonly coverage: TraceCoverage;

  constructor(coverage: TraceCoverage) {
    this.coverage = coverage;
  }

  async getExecutionIntervals(traceRoot: string): Promise<TraceCoverage> {
    this.traceRoots.push(traceRoot);
    return this.coverage;
  }
}

/**
 * Resolves module paths from a fixed table.
 */
export class FakePathResolver implements PathResolver {
  private readonly paths: ReadonlyMap<string, string>;

  constructor(paths: ReadonlyMap<string, string>) {
    this.paths = paths;
  }

  async resolveModulePath(searchPaths: readonly string[], moduleName: string): Promise<string> {
    const resolved: string | undefined = this.paths.get(moduleName);
    if (resolved === undefined) {
      throw new ModuleResolutionError(moduleName, searchPaths);
    }
    return resolved;
  }
}

/**
 * Creates a fresh temporary directory.
 */
export function makeTmpDir(): string {
  return fs.mkdtempSync(sysPath.join(os.tmpdir(), "bb-coverage-"));
}

export function removeTmpDir(dir: string): void {
  fs.rmSync(dir, {recursive: true, force: true});
}
