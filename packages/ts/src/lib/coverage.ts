import {
  BasicBlock,
  BasicBlockSet,
  CoverageResult,
  ExecutionInterval,
  Logger,
  StateId,
  StateIntervals,
} from "@bb-coverage/core";
import { nullLogger } from "./logger.js";

/**
 * Computes the basic blocks covered by each state.
 *
 * A block is covered by an interval if the start or the end of the interval
 * falls inside the block (bounds included). An interval strictly containing a
 * block without either bound inside it does not cover it.
 * The inputs are not mutated.
 * The computation is synchronous.
 *
 * @param intervalsByState Execution intervals grouped by state.
 * @param sortedBbs Basic blocks of the module.
 * @param logger Receives one debug message per state.
 * @return Covered blocks per state. States without covered blocks are absent.
 * @precondition `sortedBbs` is sorted by ascending `startAddr`
 */
export function computeCoverage(
  intervalsByState: StateIntervals,
  sortedBbs: readonly BasicBlock[],
  logger: Logger = nullLogger,
): CoverageResult {
  const result: CoverageResult = new Map();
  for (const [state, intervals] of intervalsByState) {
    logger.debug(`Calculating basic block coverage for state ${state}`, {intervals: intervals.length});
    for (const interval of intervals) {
      coverInterval(result, state, interval, sortedBbs);
    }
  }
  return result;
}

function coverInterval(
  result: CoverageResult,
  state: StateId,
  interval: ExecutionInterval,
  sortedBbs: readonly BasicBlock[],
): void {
  const {startAddr: tbStart, endAddr: tbEnd} = interval;
  for (let i: number = findStartIndex(tbStart, sortedBbs); i < sortedBbs.length; i++) {
    const bb: BasicBlock = sortedBbs[i];
    if ((bb.startAddr <= tbStart && tbStart <= bb.endAddr) || (bb.startAddr <= tbEnd && tbEnd <= bb.endAddr)) {
      let covered: BasicBlockSet | undefined = result.get(state);
      if (covered === undefined) {
        covered = new BasicBlockSet();
        result.set(state, covered);
      }
      covered.add(bb);
    }
    if (bb.startAddr > tbEnd) {
      // Sorted: no later block can contain either bound
      break;
    }
  }
}

/**
 * Returns the index from which the blocks overlapping an interval starting at
 * `startAddr` must be scanned.
 *
 * - `0` if `startAddr` is before the end of the first block.
 * - The first block starting at `startAddr` if there is one, otherwise the
 *   last block starting before `startAddr` if it contains `startAddr`, or the
 *   block after it.
 * - Moved back over the preceding blocks that still contain `startAddr`
 *   (blocks sharing a start address, or a longer block enclosing a shorter
 *   one).
 *
 * `sortedBbs.length` is returned when no block may contain `startAddr`.
 *
 * @precondition `sortedBbs` is sorted by ascending `startAddr`
 */
export function findStartIndex(startAddr: number, sortedBbs: readonly BasicBlock[]): number {
  const numBbs: number = sortedBbs.length;
  if (numBbs === 0 || startAddr <= sortedBbs[0].endAddr) {
    return 0;
  }

  // Lower bound: first block with `startAddr >= target`
  let lo: number = 0;
  let hi: number = numBbs;
  while (lo < hi) {
    const mid: number = (lo + hi) >>> 1;
    if (sortedBbs[mid].startAddr < startAddr) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }

  const exact: boolean = lo < numBbs && sortedBbs[lo].startAddr === startAddr;
  let index: number = exact ? lo : lo - 1;
  while (index > 0 && sortedBbs[index - 1].endAddr >= startAddr) {
    index--;
  }
  if (!exact && index === lo - 1 && sortedBbs[index].endAddr < startAddr) {
    return lo;
  }
  return index;
}

/**
 * Number of distinct blocks covered by at least one state.
 */
export function countCoveredBasicBlocks(coverage: CoverageResult): number {
  const union: BasicBlockSet = new BasicBlockSet();
  for (const covered of coverage.values()) {
    for (const bb of covered) {
      union.add(bb);
    }
  }
  return union.size;
}

/**
 * Checks that blocks are sorted by ascending start address.
 */
export function isSortedByStart(bbs: readonly BasicBlock[]): boolean {
  for (let i: number = 1; i < bbs.length; i++) {
    if (bbs[i - 1].startAddr > bbs[i].startAddr) {
      return false;
    }
  }
  return true;
}
