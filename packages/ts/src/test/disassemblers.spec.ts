import { Disassembler, DisassemblyUnavailableError, RawDisassembly } from "@bb-coverage/core";
import chai from "chai";
import fs from "fs";
import sysPath from "path";
import { CommandDisassembler, createDisassembler, ExportFileDisassembler, parseRawDisassembly } from "../lib/index.js";
import { makeTmpDir, removeTmpDir } from "./helpers.js";

describe("parseRawDisassembly", () => {
  it("accepts a disassembler payload", () => {
    const actual: RawDisassembly = parseRawDisassembly("app", JSON.stringify({
      base_addr: 4096,
      end_addr: 8191,
      basic_blocks: [{start_addr: 4096, end_addr: 4100, function: "main"}, {start_addr: 4101, end_addr: 4110}],
    }));
    chai.assert.deepEqual(actual, {
      base_addr: 4096,
      end_addr: 8191,
      basic_blocks: [
        {start_addr: 4096, end_addr: 4100, function: "main"},
        {start_addr: 4101, end_addr: 4110, function: ""},
      ],
    });
  });

  it("rejects payloads without basic blocks", () => {
    chai.assert.throws(
      () => parseRawDisassembly("app", "{\"base_addr\": 0, \"end_addr\": 1, \"basic_blocks\": []}"),
      DisassemblyUnavailableError,
      "No disassembly information found for app",
    );
  });

  it("rejects malformed payloads", () => {
    chai.assert.throws(() => parseRawDisassembly("app", "not json"), DisassemblyUnavailableError);
    chai.assert.throws(
      () => parseRawDisassembly("app", "{\"base_addr\": -1, \"end_addr\": 1, \"basic_blocks\": []}"),
      DisassemblyUnavailableError,
    );
  });
});

describe("ExportFileDisassembler", () => {
  let exportDir: string;

  beforeEach(() => {
    exportDir = makeTmpDir();
  });

  afterEach(() => {
    removeTmpDir(exportDir);
  });

  it("reads `<module>.json` from the export directory", async () => {
    const payload: RawDisassembly = {
      base_addr: 0x400000,
      end_addr: 0x400fff,
      basic_blocks: [{start_addr: 0x400010, end_addr: 0x40001f, function: "start"}],
    };
    fs.writeFileSync(sysPath.join(exportDir, "app.json"), JSON.stringify(payload));
    const disassembler: ExportFileDisassembler = new ExportFileDisassembler(exportDir);

    const actual: RawDisassembly = await disassembler.disassemble("/guest/bin/app");

    chai.assert.deepEqual(actual, payload);
  });

  it("fails when the export is missing", async () => {
    const disassembler: ExportFileDisassembler = new ExportFileDisassembler(exportDir);
    let error: unknown;
    try {
      await disassembler.disassemble("/guest/bin/app");
    } catch (e) {
      error = e;
    }
    chai.assert.instanceOf(error, DisassemblyUnavailableError);
  });
});

describe("createDisassembler", () => {
  it("selects the backend from the configuration", () => {
    const exported: Disassembler = createDisassembler({kind: "export", exportDir: "/exports"});
    chai.assert.instanceOf(exported, ExportFileDisassembler);

    const command: Disassembler = createDisassembler({kind: "command", command: "/opt/tools/r2-bbs", args: ["--json"]});
    chai.assert.instanceOf(command, CommandDisassembler);
    chai.assert.strictEqual(command.name, "r2-bbs");
  });

  it("passes the module path last", () => {
    const disassembler: CommandDisassembler = new CommandDisassembler("/opt/tools/ida-bbs", ["-A", "-S"]);
    chai.assert.deepEqual(disassembler.getArgs("/tmp/app"), ["-A", "-S", "/tmp/app"]);
  });
});

describe("CommandDisassembler", () => {
  it("parses the disassembly printed by the command", async () => {
    const script: string = "const target = process.argv[process.argv.length - 1];"
      + "process.stdout.write(JSON.stringify({base_addr: 4096, end_addr: 8191,"
      + " basic_blocks: [{start_addr: 4096, end_addr: 4100, function: target}]}));";
    const disassembler: CommandDisassembler = new CommandDisassembler(process.execPath, ["-e", script]);

    const actual: RawDisassembly = await disassembler.disassemble("/guest/bin/app");

    chai.assert.deepEqual(actual, {
      base_addr: 4096,
      end_addr: 8191,
      basic_blocks: [{start_addr: 4096, end_addr: 4100, function: "/guest/bin/app"}],
    });
  });

  it("fails when the command exits with an error", async () => {
    const disassembler: CommandDisassembler = new CommandDisassembler(process.execPath, ["-e", "process.exit(3)"]);
    let error: unknown;
    try {
      await disassembler.disassemble("/guest/bin/app");
    } catch (e) {
      error = e;
    }
    chai.assert.instanceOf(error, DisassemblyUnavailableError);
    chai.assert.strictEqual(
      error instanceof Error ? error.message : undefined,
      `No disassembly information found for app: ${sysPath.basename(process.execPath)} failed`,
    );
  });

  it("fails when the command prints no disassembly", async () => {
    const disassembler: CommandDisassembler = new CommandDisassembler(process.execPath, ["-e", "process.stdout.write('oops')"]);
    let error: unknown;
    try {
      await disassembler.disassemble("/guest/bin/app");
    } catch (e) {
      error = e;
    }
    chai.assert.instanceOf(error, DisassemblyUnavailableError);
  });
});
