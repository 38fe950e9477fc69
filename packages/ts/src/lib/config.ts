import { ConfigError } from "@bb-coverage/core";
import fs from "fs/promises";
import sysPath from "path";
import { z } from "zod";
import { SchemaResult, validate } from "./schema.js";

export const ExportDisassemblerConfigSchema = z.object({
  kind: z.literal("export"),
  /**
   * Directory holding `<module>.json` files exported by a disassembler script.
   */
  exportDir: z.string().min(1),
});

export const CommandDisassemblerConfigSchema = z.object({
  kind: z.literal("command"),
  /**
   * Executable printing the disassembly of the module passed as last argument.
   */
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
});

export const DisassemblerConfigSchema = z.discriminatedUnion("kind", [
  ExportDisassemblerConfigSchema,
  CommandDisassemblerConfigSchema,
]);

export const ReportFormatSchema = z.enum(["json", "drcov"]);

export const CoverageConfigSchema = z.object({
  /**
   * Project directory. Disassembly caches (`<module>.disas`) are stored here.
   */
  projectDir: z.string().min(1),
  /**
   * Directory of the run to analyze, relative to `projectDir`. Reports are
   * written to it.
   */
  traceDir: z.string().min(1).default("s2e-last"),
  /**
   * Directories searched for the modules referenced by the trace.
   */
  searchPaths: z.array(z.string()).default([]),
  format: ReportFormatSchema.default("json"),
  disassembler: DisassemblerConfigSchema,
});

export type ExportDisassemblerConfig = z.infer<typeof ExportDisassemblerConfigSchema>;
export type CommandDisassemblerConfig = z.infer<typeof CommandDisassemblerConfigSchema>;
export type DisassemblerConfig = z.infer<typeof DisassemblerConfigSchema>;
export type ReportFormat = z.infer<typeof ReportFormatSchema>;
export type CoverageConfig = z.infer<typeof CoverageConfigSchema>;
export type CoverageConfigInput = z.input<typeof CoverageConfigSchema>;

/**
 * Validates a raw configuration object and fills in the defaults.
 *
 * @param raw Configuration object, e.g. parsed from JSON.
 * @param source Description of where the configuration comes from, used in
 *               error messages.
 * @throws ConfigError
 */
export function parseCoverageConfig(raw: unknown, source: string = "<inline>"): CoverageConfig {
  const result: SchemaResult<CoverageConfig> = validate(CoverageConfigSchema, raw);
  if (!result.ok) {
    throw new ConfigError(source, result.issues);
  }
  return result.value;
}

/**
 * Reads and validates a JSON configuration file.
 *
 * Relative `projectDir` and `searchPaths` entries are resolved against the
 * directory of the file. Other relative paths are relative to `projectDir`.
 *
 * @throws ConfigError If the file is not valid JSON or fails validation.
 */
export async function loadCoverageConfig(configPath: string): Promise<CoverageConfig> {
  const text: string = await fs.readFile(configPath, {encoding: "utf-8"});
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(configPath, [e instanceof Error ? e.message : String(e)]);
  }
  const config: CoverageConfig = parseCoverageConfig(raw, configPath);
  const baseDir: string = sysPath.dirname(sysPath.resolve(configPath));
  return {
    ...config,
    projectDir: sysPath.resolve(baseDir, config.projectDir),
    searchPaths: config.searchPaths.map((searchPath: string): string => sysPath.resolve(baseDir, searchPath)),
  };
}

/**
 * Directory of the analyzed run, where reports are written.
 */
export function getTraceRoot(config: Readonly<CoverageConfig>): string {
  return sysPath.resolve(config.projectDir, config.traceDir);
}
