import { BasicBlock, compareBasicBlocks } from "./basic-block.js";

/**
 * Set of basic blocks with structural membership.
 *
 * Blocks are keyed by `BasicBlock.key()`, so two distinct instances describing
 * the same block are stored once.
 * Iteration follows insertion order.
 */
export class BasicBlockSet implements Iterable<BasicBlock> {
  private readonly blocks: Map<string, BasicBlock>;

  constructor(blocks?: Iterable<BasicBlock>) {
    this.blocks = new Map();
    if (blocks !== undefined) {
      for (const block of blocks) {
        this.add(block);
      }
    }
  }

  get size(): number {
    return this.blocks.size;
  }

  /**
   * @return `true` if the block was not already present.
   */
  add(block: BasicBlock): boolean {
    const key: string = block.key();
    if (this.blocks.has(key)) {
      return false;
    }
    this.blocks.set(key, block);
    return true;
  }

  has(block: BasicBlock): boolean {
    return this.blocks.has(block.key());
  }

  values(): IterableIterator<BasicBlock> {
    return this.blocks.values();
  }

  [Symbol.iterator](): IterableIterator<BasicBlock> {
    return this.blocks.values();
  }

  toSortedArray(): BasicBlock[] {
    const result: BasicBlock[] = [...this.blocks.values()];
    result.sort(compareBasicBlocks);
    return result;
  }
}
