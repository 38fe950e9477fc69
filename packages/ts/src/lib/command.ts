import {
  CoverageResult,
  DisassemblyInfo,
  Logger,
  ModuleReport,
  ModuleResolutionError,
  NoCoverageDataError,
  PathResolver,
  StateIntervals,
  TraceCoverage,
  TraceSource,
} from "@bb-coverage/core";
import sysPath from "path";
import { CoverageConfig, getTraceRoot } from "./config.js";
import { computeCoverage, countCoveredBasicBlocks } from "./coverage.js";
import { createDisassembler } from "./disassemblers.js";
import { DisassemblyCache } from "./disassembly-cache.js";
import { createDrcovDirectory, writeDrcovFiles } from "./drcov.js";
import { writeJsonReport } from "./json-report.js";
import { nullLogger } from "./logger.js";
import { FileSystemPathResolver } from "./path-resolver.js";

export interface BasicBlockCoverageOptions {
  config: CoverageConfig;
  traceSource: TraceSource;
  /**
   * Default: `FileSystemPathResolver`.
   */
  pathResolver?: PathResolver;
  /**
   * Default: built from `config.disassembler`.
   */
  disassemblyCache?: DisassemblyCache;
  logger?: Logger;
}

/**
 * Generates the basic block coverage report of every module of a run.
 *
 * Reports are either a single aggregate JSON file per module, or one drcov
 * file per module and state (compatible with the Lighthouse plugin).
 *
 * Each instance handles one invocation: create a new one for every run.
 */
export class BasicBlockCoverage {
  private readonly config: CoverageConfig;
  private readonly traceSource: TraceSource;
  private readonly pathResolver: PathResolver;
  private readonly cache: DisassemblyCache;
  private readonly logger: Logger;
  private drcovDir: string | undefined;

  constructor(options: Readonly<BasicBlockCoverageOptions>) {
    this.config = options.config;
    this.traceSource = options.traceSource;
    this.pathResolver = options.pathResolver ?? new FileSystemPathResolver();
    this.logger = options.logger ?? nullLogger;
    this.cache = options.disassemblyCache ?? new DisassemblyCache({
      cacheDir: this.config.projectDir,
      disassembler: createDisassembler(this.config.disassembler),
      logger: this.logger,
    });
    this.drcovDir = undefined;
  }

  /**
   * Writes the report of every traced module.
   *
   * Modules that cannot be located are logged and skipped.
   *
   * @return The reports written, in trace order.
   * @throws DisassemblyUnavailableError
   * @throws NoCoverageDataError
   * @throws ReportAlreadyExistsError
   */
  async run(): Promise<ModuleReport[]> {
    const traceRoot: string = getTraceRoot(this.config);
    const traceCoverage: TraceCoverage = await this.traceSource.getExecutionIntervals(traceRoot);

    const reports: ModuleReport[] = [];
    for (const [tracedPath, intervals] of traceCoverage) {
      let modulePath: string;
      try {
        modulePath = await this.pathResolver.resolveModulePath(this.config.searchPaths, tracedPath);
      } catch (e) {
        if (!(e instanceof ModuleResolutionError)) {
          throw e;
        }
        this.logger.error(e.message, {module: tracedPath});
        continue;
      }
      reports.push(await this.saveCoverage(modulePath, intervals));
    }
    return reports;
  }

  /**
   * Computes the coverage of one module and writes its report.
   */
  async saveCoverage(modulePath: string, intervals: StateIntervals): Promise<ModuleReport> {
    const moduleName: string = sysPath.basename(modulePath);
    const disasInfo: DisassemblyInfo = await this.cache.get(moduleName, modulePath);

    const coverage: CoverageResult = computeCoverage(intervals, disasInfo.bbs, this.logger);
    if (coverage.size === 0) {
      throw new NoCoverageDataError(moduleName);
    }

    const totalBasicBlocks: number = disasInfo.bbs.length;
    const coveredBasicBlocks: number = countCoveredBasicBlocks(coverage);

    const reportPath: string = await this.writeReport(modulePath, disasInfo, coverage, coveredBasicBlocks);

    const percent: string = (coveredBasicBlocks / totalBasicBlocks * 100).toFixed(1);
    this.logger.info(`Basic block coverage saved to ${reportPath}`, {module: moduleName});
    this.logger.info(`Total basic blocks: ${totalBasicBlocks}`, {module: moduleName});
    this.logger.info(`Covered basic blocks: ${coveredBasicBlocks} (${percent}%)`, {module: moduleName});

    return {moduleName, modulePath, reportPath, totalBasicBlocks, coveredBasicBlocks};
  }

  private async writeReport(
    modulePath: string,
    disasInfo: DisassemblyInfo,
    coverage: CoverageResult,
    coveredBasicBlocks: number,
  ): Promise<string> {
    switch (this.config.format) {
      case "drcov":
        return this.saveDrcov(modulePath, disasInfo, coverage);
      case "json":
        return writeJsonReport(
          getTraceRoot(this.config),
          sysPath.basename(modulePath),
          coverage,
          disasInfo.bbs.length,
          coveredBasicBlocks,
        );
    }
  }

  /**
   * The drcov directory is created on the first module of the run and shared
   * by the following ones.
   */
  private async saveDrcov(modulePath: string, disasInfo: DisassemblyInfo, coverage: CoverageResult): Promise<string> {
    if (this.drcovDir === undefined) {
      this.drcovDir = await createDrcovDirectory(getTraceRoot(this.config));
    }
    await writeDrcovFiles(this.drcovDir, modulePath, disasInfo.baseAddr, disasInfo.endAddr, coverage);
    return this.drcovDir;
  }
}
