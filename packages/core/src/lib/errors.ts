/**
 * No static basic block information could be produced or loaded for a module.
 */
export class DisassemblyUnavailableError extends Error {
  readonly moduleName: string;

  constructor(moduleName: string, reason?: string, options?: ErrorOptions) {
    super(
      reason === undefined
        ? `No disassembly information found for ${moduleName}`
        : `No disassembly information found for ${moduleName}: ${reason}`,
      options,
    );
    this.name = "DisassemblyUnavailableError";
    this.moduleName = moduleName;
  }
}

/**
 * The execution intervals of a module did not touch any basic block.
 */
export class NoCoverageDataError extends Error {
  readonly moduleName: string;

  constructor(moduleName: string) {
    super(`No basic block coverage information found for ${moduleName}`);
    this.name = "NoCoverageDataError";
    this.moduleName = moduleName;
  }
}

/**
 * A report target already exists on disk.
 */
export class ReportAlreadyExistsError extends Error {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`Report ${path} already exists`, options);
    this.name = "ReportAlreadyExistsError";
    this.path = path;
  }
}

/**
 * A module referenced by the trace data could not be located on disk.
 */
export class ModuleResolutionError extends Error {
  readonly moduleName: string;
  readonly searchPaths: readonly string[];

  constructor(moduleName: string, searchPaths: readonly string[]) {
    super(`Could not find ${moduleName} in search paths: [${searchPaths.join(", ")}]`);
    this.name = "ModuleResolutionError";
    this.moduleName = moduleName;
    this.searchPaths = searchPaths;
  }
}

/**
 * A basic block does not fit in a drcov record.
 */
export class ReportEncodingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReportEncodingError";
  }
}

/**
 * The coverage configuration is invalid.
 */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[]) {
    super(`Invalid coverage configuration (${source}): ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
