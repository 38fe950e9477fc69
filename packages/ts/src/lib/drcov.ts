import { BasicBlock, CoverageResult, ReportAlreadyExistsError, ReportEncodingError } from "@bb-coverage/core";
import fs, { FileHandle } from "fs/promises";
import sysPath from "path";

export const DRCOV_DIR_NAME: string = "drcov";

const DRCOV_HEADER: string = "DRCOV VERSION: 2\n"
  + "DRCOV FLAVOR: S2E\n"
  + "Module Table: version 2, count 1\n"
  + "Columns: id, base, end, entry, checksum, timestamp, path\n";

/**
 * Only one module is described per file.
 */
const MODULE_ID: number = 0;

/**
 * Size in bytes of a basic block entry:
 *
 * ```c
 * typedef struct _bb_entry_t {
 *     uint start;   // offset of bb start from the image base
 *     ushort size;
 *     ushort mod_id;
 * } bb_entry_t;
 * ```
 */
export const DRCOV_BB_ENTRY_SIZE: number = 8;

const MAX_U32: number = 0xffffffff;
const MAX_U16: number = 0xffff;

/**
 * Returns the name of the drcov file for the given module and state.
 */
export function getDrcovFileName(moduleName: string, state: number): string {
  return `${moduleName}_coverage_${state.toString(10)}.drcov`;
}

/**
 * Encodes the coverage of one state as a drcov (version 2) file.
 *
 * The blocks are written in address order.
 *
 * @param modulePath Path of the module, written in the module table.
 * @param baseAddr Base address of the module.
 * @param endAddr End address of the module.
 * @param blocks Blocks covered by the state.
 * @throws ReportEncodingError If a block does not fit in a drcov entry.
 */
export function encodeDrcov(
  modulePath: string,
  baseAddr: number,
  endAddr: number,
  blocks: Iterable<BasicBlock>,
): Buffer {
  const sorted: BasicBlock[] = [...blocks];
  sorted.sort((a: BasicBlock, b: BasicBlock): number => a.startAddr - b.startAddr);

  const header: string = DRCOV_HEADER
    + formatModuleRow(MODULE_ID, baseAddr, endAddr, modulePath)
    + `BB Table: ${sorted.length.toString(10)} bbs\n`;

  const table: Buffer = Buffer.alloc(sorted.length * DRCOV_BB_ENTRY_SIZE);
  for (let i: number = 0; i < sorted.length; i++) {
    const bb: BasicBlock = sorted[i];
    const offset: number = bb.startAddr - baseAddr;
    const size: number = bb.endAddr - bb.startAddr;
    if (offset < 0 || offset > MAX_U32) {
      throw new ReportEncodingError(`Offset of ${bb.toString()} from base 0x${baseAddr.toString(16)} does not fit in 32 bits`);
    }
    if (size < 0 || size > MAX_U16) {
      throw new ReportEncodingError(`Size of ${bb.toString()} does not fit in 16 bits`);
    }
    const pos: number = i * DRCOV_BB_ENTRY_SIZE;
    table.writeUInt32LE(offset, pos);
    table.writeUInt16LE(size, pos + 4);
    table.writeUInt16LE(MODULE_ID, pos + 6);
  }

  return Buffer.concat([Buffer.from(header, "utf-8"), table]);
}

/**
 * Formats the single row of the module table:
 * `id, base, end, entry, checksum, timestamp, path`.
 *
 * Entry, checksum and timestamp are unknown and written as zero.
 */
function formatModuleRow(id: number, baseAddr: number, endAddr: number, path: string): string {
  const columns: string[] = [
    id.toString(10).padStart(3, " "),
    formatHex(baseAddr, 16),
    formatHex(endAddr, 16),
    formatHex(0, 16),
    formatHex(0, 8),
    formatHex(0, 8),
    path,
  ];
  return `${columns.join(", ")}\n`;
}

/**
 * Formats a number as `0x`-prefixed hexadecimal, zero-padded to `width`
 * characters (prefix included).
 */
function formatHex(value: number, width: number): string {
  return `0x${value.toString(16).padStart(width - 2, "0")}`;
}

/**
 * Creates the drcov output directory inside `reportDir`.
 *
 * The directory is created exclusively: existing results are never merged
 * or overwritten.
 *
 * @return Path of the created directory.
 * @throws ReportAlreadyExistsError If the directory already exists.
 */
export async function createDrcovDirectory(reportDir: string): Promise<string> {
  const drcovDir: string = sysPath.join(reportDir, DRCOV_DIR_NAME);
  try {
    await fs.mkdir(drcovDir);
  } catch (e) {
    if (isErrorCode(e, "EEXIST")) {
      throw new ReportAlreadyExistsError(drcovDir, {cause: e});
    }
    throw e;
  }
  return drcovDir;
}

/**
 * Writes one drcov file per state into an existing directory.
 *
 * @return Paths of the written files.
 * @throws ReportAlreadyExistsError If one of the files already exists.
 */
export async function writeDrcovFiles(
  drcovDir: string,
  modulePath: string,
  baseAddr: number,
  endAddr: number,
  coverage: CoverageResult,
): Promise<string[]> {
  const moduleName: string = sysPath.basename(modulePath);
  const written: string[] = [];
  for (const [state, blocks] of coverage) {
    const filePath: string = sysPath.join(drcovDir, getDrcovFileName(moduleName, state));
    const data: Buffer = encodeDrcov(modulePath, baseAddr, endAddr, blocks);
    let handle: FileHandle;
    try {
      handle = await fs.open(filePath, "wx");
    } catch (e) {
      if (isErrorCode(e, "EEXIST")) {
        throw new ReportAlreadyExistsError(filePath, {cause: e});
      }
      throw e;
    }
    try {
      await handle.writeFile(data);
    } finally {
      await handle.close();
    }
    written.push(filePath);
  }
  return written;
}

/**
 * Writes the coverage of every state to its own drcov file, in a new `drcov`
 * directory inside `reportDir`.
 *
 * Only the given module is described: coverage of shared libraries is not
 * included.
 *
 * @return Path of the drcov directory.
 * @throws ReportAlreadyExistsError If the drcov directory already exists.
 */
export async function writeDrcovReport(
  reportDir: string,
  modulePath: string,
  baseAddr: number,
  endAddr: number,
  coverage: CoverageResult,
): Promise<string> {
  const drcovDir: string = await createDrcovDirectory(reportDir);
  await writeDrcovFiles(drcovDir, modulePath, baseAddr, endAddr, coverage);
  return drcovDir;
}

function isErrorCode(e: unknown, code: string): boolean {
  return typeof e === "object" && e !== null && Reflect.get(e, "code") === code;
}
