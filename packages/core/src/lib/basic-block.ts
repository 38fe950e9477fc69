/**
 * JSON representation of a basic block, as stored in `.disas` caches and
 * coverage reports.
 */
export interface BasicBlockRecord {
  start_addr: number;
  end_addr: number;
  function: string;
}

/**
 * Immutable static basic block.
 *
 * `endAddr` is inclusive.
 */
export class BasicBlock {
  readonly startAddr: number;
  readonly endAddr: number;
  readonly functionName: string;

  /**
   * @precondition `endAddr >= startAddr`
   */
  constructor(startAddr: number, endAddr: number, functionName: string = "") {
    this.startAddr = startAddr;
    this.endAddr = endAddr;
    this.functionName = functionName;
    Object.freeze(this);
  }

  static fromJSON(record: Readonly<BasicBlockRecord>): BasicBlock {
    return new BasicBlock(record.start_addr, record.end_addr, record.function);
  }

  /**
   * Returns a string identifying the block by its three fields.
   *
   * Two blocks are equal iff their keys are equal.
   */
  key(): string {
    return `${this.startAddr.toString(10)}:${this.endAddr.toString(10)}:${this.functionName}`;
  }

  equals(other: BasicBlock): boolean {
    return this.startAddr === other.startAddr
      && this.endAddr === other.endAddr
      && this.functionName === other.functionName;
  }

  toJSON(): BasicBlockRecord {
    return {start_addr: this.startAddr, end_addr: this.endAddr, function: this.functionName};
  }

  toString(): string {
    return `BB(start=0x${this.startAddr.toString(16)}, end=0x${this.endAddr.toString(16)}, function=${this.functionName})`;
  }
}

/**
 * Compares two basic blocks.
 *
 * Blocks are ordered by ascending `startAddr`, then by ascending `endAddr` and
 * finally by function name, so sorting is deterministic.
 */
export function compareBasicBlocks(a: BasicBlock, b: BasicBlock): number {
  if (a.startAddr !== b.startAddr) {
    return a.startAddr - b.startAddr;
  } else if (a.endAddr !== b.endAddr) {
    return a.endAddr - b.endAddr;
  } else if (a.functionName === b.functionName) {
    return 0;
  } else {
    return a.functionName < b.functionName ? -1 : 1;
  }
}
