import {
  BasicBlock,
  BasicBlockRecord,
  compareBasicBlocks,
  Disassembler,
  DisassemblyInfo,
  DisassemblyInfoRecord,
  DisassemblyUnavailableError,
  Logger,
  RawDisassembly,
} from "@bb-coverage/core";
import fs from "fs/promises";
import sysPath from "path";
import { isSortedByStart } from "./coverage.js";
import { nullLogger } from "./logger.js";
import { DisassemblyInfoRecordSchema, SchemaResult, validate } from "./schema.js";

export interface DisassemblyCacheOptions {
  /**
   * Directory holding the `<module>.disas` files.
   */
  cacheDir: string;
  disassembler: Disassembler;
  logger?: Logger;
}

export function getDisasFileName(moduleName: string): string {
  return `${moduleName}.disas`;
}

/**
 * Builds the disassembly info from the disassembler output.
 *
 * The blocks are sorted once here: the coverage computation requires them
 * in address order.
 */
export function toDisassemblyInfo(raw: Readonly<RawDisassembly>): DisassemblyInfo {
  const bbs: BasicBlock[] = raw.basic_blocks.map((record: BasicBlockRecord): BasicBlock => BasicBlock.fromJSON(record));
  bbs.sort(compareBasicBlocks);
  return {bbs, baseAddr: raw.base_addr, endAddr: raw.end_addr};
}

export function toDisassemblyInfoRecord(info: DisassemblyInfo): DisassemblyInfoRecord {
  return {
    bbs: info.bbs.map((bb: BasicBlock): BasicBlockRecord => bb.toJSON()),
    base_addr: info.baseAddr,
    end_addr: info.endAddr,
  };
}

/**
 * Disassembly results persisted as JSON (`<module>.disas`), so that large
 * binaries are only disassembled once.
 *
 * A cache file is stale when the module was modified after it was written.
 */
export class DisassemblyCache {
  private readonly cacheDir: string;
  private readonly disassembler: Disassembler;
  private readonly logger: Logger;

  constructor(options: Readonly<DisassemblyCacheOptions>) {
    this.cacheDir = options.cacheDir;
    this.disassembler = options.disassembler;
    this.logger = options.logger ?? nullLogger;
  }

  getCachePath(moduleName: string): string {
    return sysPath.join(this.cacheDir, getDisasFileName(moduleName));
  }

  /**
   * Returns the disassembly info of a module, from the cache if it is up to
   * date, or from the disassembler otherwise (and then caches it).
   *
   * @param moduleName Name of the module, used to name the cache file.
   * @param modulePath Path of the module on disk.
   * @throws DisassemblyUnavailableError
   */
  async get(moduleName: string, modulePath: string): Promise<DisassemblyInfo> {
    const cached: DisassemblyInfo | undefined = await this.load(moduleName, modulePath);
    if (cached !== undefined) {
      return cached;
    }

    this.logger.info(`Disassembling ${modulePath} with ${this.disassembler.name}`);
    const raw: RawDisassembly = await this.disassembler.disassemble(modulePath);
    if (raw.basic_blocks.length === 0) {
      throw new DisassemblyUnavailableError(moduleName);
    }
    const info: DisassemblyInfo = toDisassemblyInfo(raw);
    await this.save(moduleName, info);
    return info;
  }

  /**
   * @return The cached info, or `undefined` if there is no usable cache file.
   */
  async load(moduleName: string, modulePath: string): Promise<DisassemblyInfo | undefined> {
    const cachePath: string = this.getCachePath(moduleName);
    this.logger.debug(`Checking for existing ${cachePath}`);

    const cacheMtime: number | undefined = await getMtime(cachePath);
    if (cacheMtime === undefined) {
      this.logger.info(`No .disas file found for ${moduleName}`);
      return undefined;
    }
    const moduleMtime: number | undefined = await getMtime(modulePath);
    if (moduleMtime !== undefined && cacheMtime < moduleMtime) {
      this.logger.info(`${cachePath} is out of date. A new .disas file will be generated`);
      return undefined;
    }

    const text: string = await fs.readFile(cachePath, {encoding: "utf-8"});
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      this.logger.warn(`${cachePath} is not valid JSON. A new .disas file will be generated`, {
        error: e instanceof Error ? e.message : String(e),
      });
      return undefined;
    }
    const result: SchemaResult<DisassemblyInfoRecord> = validate(DisassemblyInfoRecordSchema, raw);
    if (!result.ok) {
      this.logger.warn(`${cachePath} is invalid. A new .disas file will be generated`, {issues: result.issues});
      return undefined;
    }

    this.logger.info(`${cachePath} found. Returning cached basic blocks`);
    const bbs: BasicBlock[] = result.value.bbs.map((record: BasicBlockRecord): BasicBlock => BasicBlock.fromJSON(record));
    if (!isSortedByStart(bbs)) {
      bbs.sort(compareBasicBlocks);
    }
    return {bbs, baseAddr: result.value.base_addr, endAddr: result.value.end_addr};
  }

  async save(moduleName: string, info: DisassemblyInfo): Promise<string> {
    const cachePath: string = this.getCachePath(moduleName);
    this.logger.info(`Saving disassembly information to ${cachePath}`);
    await fs.writeFile(cachePath, JSON.stringify(toDisassemblyInfoRecord(info)), {encoding: "utf-8"});
    return cachePath;
  }
}

/**
 * @return Modification time in milliseconds, or `undefined` if the file does
 *         not exist.
 */
async function getMtime(path: string): Promise<number | undefined> {
  try {
    const stats: {mtimeMs: number} = await fs.stat(path);
    return stats.mtimeMs;
  } catch (e) {
    const isEnoent: boolean = typeof e === "object" && e !== null && Reflect.get(e, "code") === "ENOENT";
    if (!isEnoent) {
      throw e;
    }
    return undefined;
  }
}
