import { Disassembler, DisassemblyUnavailableError, RawDisassembly } from "@bb-coverage/core";
import childProcess from "child_process";
import fs from "fs/promises";
import sysPath from "path";
import { promisify } from "util";
import type { CommandDisassemblerConfig, DisassemblerConfig, ExportDisassemblerConfig } from "./config.js";
import { RawDisassemblySchema, SchemaResult, validate } from "./schema.js";

const execFile = promisify(childProcess.execFile);

/**
 * Disassembly output of large binaries easily exceeds the default 1MiB.
 */
const MAX_OUTPUT_BYTES: number = 512 * 1024 * 1024;

/**
 * Parses the JSON payload produced by a disassembler backend.
 *
 * @throws DisassemblyUnavailableError If the payload is not valid JSON, does
 *         not match the expected shape or lists no basic block.
 */
export function parseRawDisassembly(moduleName: string, text: string): RawDisassembly {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new DisassemblyUnavailableError(moduleName, "invalid JSON", {cause: e});
  }
  const result: SchemaResult<RawDisassembly> = validate(RawDisassemblySchema, raw);
  if (!result.ok) {
    throw new DisassemblyUnavailableError(moduleName, result.issues.join("; "));
  }
  if (result.value.basic_blocks.length === 0) {
    throw new DisassemblyUnavailableError(moduleName);
  }
  return result.value;
}

/**
 * Reads the disassembly exported beforehand by a disassembler script
 * (IDA Pro, Radare2, Binary Ninja) as `<exportDir>/<module>.json`.
 */
export class ExportFileDisassembler implements Disassembler {
  readonly name: string = "export";
  private readonly exportDir: string;

  constructor(exportDir: string) {
    this.exportDir = exportDir;
  }

  getExportPath(modulePath: string): string {
    return sysPath.join(this.exportDir, `${sysPath.basename(modulePath)}.json`);
  }

  async disassemble(modulePath: string): Promise<RawDisassembly> {
    const moduleName: string = sysPath.basename(modulePath);
    const exportPath: string = this.getExportPath(modulePath);
    let text: string;
    try {
      text = await fs.readFile(exportPath, {encoding: "utf-8"});
    } catch (e) {
      throw new DisassemblyUnavailableError(moduleName, `cannot read ${exportPath}`, {cause: e});
    }
    return parseRawDisassembly(moduleName, text);
  }
}

/**
 * Runs an external disassembler printing the disassembly as JSON on its
 * standard output. The module path is passed as the last argument.
 */
export class CommandDisassembler implements Disassembler {
  readonly name: string;
  private readonly command: string;
  private readonly args: readonly string[];

  constructor(command: string, args: readonly string[] = []) {
    this.name = sysPath.basename(command);
    this.command = command;
    this.args = args;
  }

  getArgs(modulePath: string): string[] {
    return [...this.args, modulePath];
  }

  async disassemble(modulePath: string): Promise<RawDisassembly> {
    const moduleName: string = sysPath.basename(modulePath);
    let stdout: string;
    try {
      const out: {stdout: string; stderr: string} = await execFile(this.command, this.getArgs(modulePath), {
        encoding: "utf-8",
        maxBuffer: MAX_OUTPUT_BYTES,
      });
      stdout = out.stdout;
    } catch (e) {
      throw new DisassemblyUnavailableError(moduleName, `${this.name} failed`, {cause: e});
    }
    return parseRawDisassembly(moduleName, stdout);
  }
}

/**
 * Creates the disassembler backend selected by the configuration.
 */
export function createDisassembler(config: Readonly<DisassemblerConfig>): Disassembler {
  switch (config.kind) {
    case "export":
      return createExportDisassembler(config);
    case "command":
      return createCommandDisassembler(config);
  }
}

function createExportDisassembler(config: Readonly<ExportDisassemblerConfig>): ExportFileDisassembler {
  return new ExportFileDisassembler(config.exportDir);
}

function createCommandDisassembler(config: Readonly<CommandDisassemblerConfig>): CommandDisassembler {
  return new CommandDisassembler(config.command, config.args);
}
