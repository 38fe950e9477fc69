import { BasicBlock, BasicBlockSet, BbCoverageTools, CoverageResult, ExecutionInterval, StateIntervals } from "@bb-coverage/core";
import chai from "chai";

/**
 * Generate a Mocha test suite for the provided
 * implementation of the coverage engine.
 */
export function testImpl(lib: BbCoverageTools) {
  describe("computeCoverage", () => {
    it("covers a block containing the start of an interval", () => {
      const actual: CoverageResult = lib.computeCoverage(intervals([15, 25]), [new BasicBlock(10, 20)]);
      chai.assert.deepEqual(coveredStarts(actual), {0: [10]});
    });

    it("covers a block containing the end of an interval", () => {
      const actual: CoverageResult = lib.computeCoverage(intervals([0, 12]), [new BasicBlock(10, 20)]);
      chai.assert.deepEqual(coveredStarts(actual), {0: [10]});
    });

    it("does not cover a block ending before the interval", () => {
      const actual: CoverageResult = lib.computeCoverage(intervals([21, 30]), [new BasicBlock(10, 20)]);
      chai.assert.strictEqual(actual.size, 0);
    });

    it("covers a block equal to the interval", () => {
      const actual: CoverageResult = lib.computeCoverage(intervals([10, 20]), [new BasicBlock(10, 20)]);
      chai.assert.deepEqual(coveredStarts(actual), {0: [10]});
    });

    it("covers blocks touched by the bounds of an interval only", () => {
      const bbs: BasicBlock[] = [
        new BasicBlock(0x00, 0x0f),
        new BasicBlock(0x10, 0x1f),
        new BasicBlock(0x20, 0x2f),
        new BasicBlock(0x30, 0x3f),
      ];
      const actual: CoverageResult = lib.computeCoverage(intervals([0x18, 0x34]), bbs);
      chai.assert.deepEqual(coveredStarts(actual), {0: [0x10, 0x30]});
    });

    it("covers a block when the interval starts strictly inside it", () => {
      const bbs: BasicBlock[] = [
        new BasicBlock(0x100, 0x10f),
        new BasicBlock(0x110, 0x11f),
        new BasicBlock(0x120, 0x12f),
        new BasicBlock(0x130, 0x13f),
      ];
      const actual: CoverageResult = lib.computeCoverage(intervals([0x124, 0x128]), bbs);
      chai.assert.deepEqual(coveredStarts(actual), {0: [0x120]});
    });

    it("keeps the states apart", () => {
      const bbs: BasicBlock[] = [new BasicBlock(0x10, 0x1f), new BasicBlock(0x20, 0x2f)];
      const input: StateIntervals = new Map([
        [3, [{startAddr: 0x10, endAddr: 0x1f}]],
        [7, [{startAddr: 0x20, endAddr: 0x2f}, {startAddr: 0x10, endAddr: 0x12}]],
      ]);
      const actual: CoverageResult = lib.computeCoverage(input, bbs);
      chai.assert.deepEqual(coveredStarts(actual), {3: [0x10], 7: [0x10, 0x20]});
    });

    it("stores each block once per state", () => {
      const bb: BasicBlock = new BasicBlock(0x10, 0x1f, "f");
      const actual: CoverageResult = lib.computeCoverage(intervals([0x10, 0x1f], [0x12, 0x14], [0x1f, 0x1f]), [bb]);
      const covered: BasicBlockSet | undefined = actual.get(0);
      chai.assert.isDefined(covered);
      chai.assert.strictEqual(covered?.size, 1);
    });

    it("returns the same result for the same inputs", () => {
      const bbs: BasicBlock[] = [new BasicBlock(0, 9), new BasicBlock(10, 19), new BasicBlock(20, 29)];
      const input: StateIntervals = intervals([5, 12], [25, 40]);
      const first: CoverageResult = lib.computeCoverage(input, bbs);
      const second: CoverageResult = lib.computeCoverage(input, bbs);
      chai.assert.deepEqual(coveredStarts(first), coveredStarts(second));
      chai.assert.deepEqual(coveredStarts(first), {0: [0, 10, 20]});
    });

    it("does not mutate the block list", () => {
      const bbs: BasicBlock[] = [new BasicBlock(0, 9), new BasicBlock(10, 19)];
      const copy: BasicBlock[] = [...bbs];
      lib.computeCoverage(intervals([0, 19]), bbs);
      chai.assert.deepEqual(bbs, copy);
    });

    it("covers every block sharing the start address", () => {
      const bbs: BasicBlock[] = [
        new BasicBlock(0x00, 0x0f, "a"),
        new BasicBlock(0x20, 0x2f, "f"),
        new BasicBlock(0x20, 0x2f, "g"),
        new BasicBlock(0x40, 0x4f, "h"),
      ];
      const actual: CoverageResult = lib.computeCoverage(intervals([0x24, 0x28]), bbs);
      chai.assert.deepEqual(coveredNames(actual), {0: ["f", "g"]});
    });

    it("covers a block enclosing a shorter one", () => {
      const bbs: BasicBlock[] = [
        new BasicBlock(0x00, 0x0f, "a"),
        new BasicBlock(0x10, 0x4f, "outer"),
        new BasicBlock(0x20, 0x2f, "inner"),
      ];
      const actual: CoverageResult = lib.computeCoverage(intervals([0x30, 0x38]), bbs);
      chai.assert.deepEqual(coveredNames(actual), {0: ["outer"]});
    });

    it("accepts empty inputs", () => {
      chai.assert.strictEqual(lib.computeCoverage(new Map(), [new BasicBlock(0, 9)]).size, 0);
      chai.assert.strictEqual(lib.computeCoverage(intervals([0, 9]), []).size, 0);
      chai.assert.strictEqual(lib.computeCoverage(new Map([[1, []]]), [new BasicBlock(0, 9)]).size, 0);
    });
  });

  describe("findStartIndex", () => {
    const bbs: BasicBlock[] = [
      new BasicBlock(0x10, 0x1f),
      new BasicBlock(0x20, 0x2f),
      new BasicBlock(0x40, 0x4f),
    ];

    it("returns 0 before the end of the first block", () => {
      chai.assert.strictEqual(lib.findStartIndex(0x00, bbs), 0);
      chai.assert.strictEqual(lib.findStartIndex(0x1f, bbs), 0);
    });

    it("returns the length past the end of the last block", () => {
      chai.assert.strictEqual(lib.findStartIndex(0x50, bbs), 3);
    });

    it("skips a preceding block ending before the address", () => {
      chai.assert.strictEqual(lib.findStartIndex(0x30, bbs), 2);
    });

    it("returns the block starting at the address", () => {
      chai.assert.strictEqual(lib.findStartIndex(0x20, bbs), 1);
      chai.assert.strictEqual(lib.findStartIndex(0x40, bbs), 2);
    });

    it("returns the last block starting before the address", () => {
      chai.assert.strictEqual(lib.findStartIndex(0x24, bbs), 1);
      chai.assert.strictEqual(lib.findStartIndex(0x44, bbs), 2);
    });

    it("returns the first of the blocks sharing a start address", () => {
      const shared: BasicBlock[] = [
        new BasicBlock(0x00, 0x0f, "a"),
        new BasicBlock(0x20, 0x2f, "f"),
        new BasicBlock(0x20, 0x2f, "g"),
        new BasicBlock(0x40, 0x4f, "h"),
      ];
      chai.assert.strictEqual(lib.findStartIndex(0x24, shared), 1);
      chai.assert.strictEqual(lib.findStartIndex(0x20, shared), 1);
    });

    it("returns an enclosing block starting earlier", () => {
      const nested: BasicBlock[] = [
        new BasicBlock(0x00, 0x0f, "a"),
        new BasicBlock(0x10, 0x4f, "outer"),
        new BasicBlock(0x20, 0x2f, "inner"),
      ];
      chai.assert.strictEqual(lib.findStartIndex(0x30, nested), 1);
      chai.assert.strictEqual(lib.findStartIndex(0x24, nested), 1);
    });

    it("returns 0 for an empty list", () => {
      chai.assert.strictEqual(lib.findStartIndex(0x24, []), 0);
    });
  });

  describe("countCoveredBasicBlocks", () => {
    it("counts blocks shared by several states once", () => {
      const bbs: BasicBlock[] = [new BasicBlock(0, 9), new BasicBlock(10, 19), new BasicBlock(20, 29)];
      const input: StateIntervals = new Map([
        [0, [{startAddr: 0, endAddr: 12}]],
        [1, [{startAddr: 10, endAddr: 22}]],
      ]);
      const coverage: CoverageResult = lib.computeCoverage(input, bbs);
      chai.assert.strictEqual(lib.countCoveredBasicBlocks(coverage), 3);
    });
  });
}

function intervals(...ranges: [number, number][]): StateIntervals {
  const list: ExecutionInterval[] = ranges.map(([startAddr, endAddr]: [number, number]): ExecutionInterval => {
    return {startAddr, endAddr};
  });
  return new Map([[0, list]]);
}

function coveredStarts(coverage: CoverageResult): Record<number, number[]> {
  const result: Record<number, number[]> = {};
  for (const [state, covered] of coverage) {
    result[state] = covered.toSortedArray().map((bb: BasicBlock): number => bb.startAddr);
  }
  return result;
}

function coveredNames(coverage: CoverageResult): Record<number, string[]> {
  const result: Record<number, string[]> = {};
  for (const [state, covered] of coverage) {
    result[state] = covered.toSortedArray().map((bb: BasicBlock): string => bb.functionName);
  }
  return result;
}
