import type { BasicBlockRecord, CoverageResult, JsonCoverageReport } from "@bb-coverage/core";
import fs from "fs/promises";
import sysPath from "path";

export function getJsonReportFileName(moduleName: string): string {
  return `${moduleName}_coverage.json`;
}

/**
 * Builds the aggregate coverage report across all states.
 *
 * The states are not kept apart: the coverage list is the concatenation of
 * the blocks of each state (in address order), so a block covered by two
 * states appears twice.
 */
export function toJsonReport(
  coverage: CoverageResult,
  totalBbs: number,
  coveredBbs: number,
): JsonCoverageReport {
  const records: BasicBlockRecord[] = [];
  for (const blocks of coverage.values()) {
    for (const bb of blocks.toSortedArray()) {
      records.push(bb.toJSON());
    }
  }
  return {
    stats: {
      total_basic_blocks: totalBbs,
      covered_basic_blocks: coveredBbs,
    },
    coverage: records,
  };
}

/**
 * Writes the aggregate coverage report to `<reportDir>/<moduleName>_coverage.json`.
 *
 * @return Path of the JSON file.
 */
export async function writeJsonReport(
  reportDir: string,
  moduleName: string,
  coverage: CoverageResult,
  totalBbs: number,
  coveredBbs: number,
): Promise<string> {
  const reportPath: string = sysPath.join(reportDir, getJsonReportFileName(moduleName));
  const report: JsonCoverageReport = toJsonReport(coverage, totalBbs, coveredBbs);
  await fs.writeFile(reportPath, JSON.stringify(report), {encoding: "utf-8"});
  return reportPath;
}
