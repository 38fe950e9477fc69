import { BasicBlock, BasicBlockSet, CoverageResult, JsonCoverageReport } from "@bb-coverage/core";
import chai from "chai";
import fs from "fs";
import sysPath from "path";
import { toJsonReport, writeJsonReport } from "../lib/index.js";
import { makeTmpDir, removeTmpDir } from "./helpers.js";

describe("toJsonReport", () => {
  it("reports the statistics and every covered block", () => {
    const coverage: CoverageResult = new Map([
      [0, new BasicBlockSet([new BasicBlock(0x20, 0x2f, "g"), new BasicBlock(0x10, 0x1f, "f")])],
      [1, new BasicBlockSet([new BasicBlock(0x40, 0x4f, "")])],
    ]);
    const expected: JsonCoverageReport = {
      stats: {total_basic_blocks: 10, covered_basic_blocks: 3},
      coverage: [
        {start_addr: 0x10, end_addr: 0x1f, function: "f"},
        {start_addr: 0x20, end_addr: 0x2f, function: "g"},
        {start_addr: 0x40, end_addr: 0x4f, function: ""},
      ],
    };
    chai.assert.deepEqual(toJsonReport(coverage, 10, 3), expected);
  });

  it("keeps blocks covered by several states once per state", () => {
    const shared: BasicBlock = new BasicBlock(0x10, 0x1f, "f");
    const coverage: CoverageResult = new Map([
      [0, new BasicBlockSet([shared])],
      [1, new BasicBlockSet([shared])],
    ]);
    const actual: JsonCoverageReport = toJsonReport(coverage, 4, 1);
    chai.assert.strictEqual(actual.stats.covered_basic_blocks, 1);
    chai.assert.lengthOf(actual.coverage, 2);
  });
});

describe("writeJsonReport", () => {
  let reportDir: string;

  beforeEach(() => {
    reportDir = makeTmpDir();
  });

  afterEach(() => {
    removeTmpDir(reportDir);
  });

  it("writes `<module>_coverage.json` with integer addresses", async () => {
    const coverage: CoverageResult = new Map([
      [2, new BasicBlockSet([new BasicBlock(4096, 4111, "main")])],
    ]);
    const reportPath: string = await writeJsonReport(reportDir, "app", coverage, 7, 1);
    chai.assert.strictEqual(reportPath, sysPath.join(reportDir, "app_coverage.json"));
    chai.assert.strictEqual(
      fs.readFileSync(reportPath, {encoding: "utf-8"}),
      "{\"stats\":{\"total_basic_blocks\":7,\"covered_basic_blocks\":1},"
      + "\"coverage\":[{\"start_addr\":4096,\"end_addr\":4111,\"function\":\"main\"}]}",
    );
  });
});
