import assert from "node:assert/strict";
import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import type { Selection } from "../config.js";
import type { Logger } from "../logging.js";
import { MockDocument, MockHost, type MockHostOptions } from "../mock_host.js";
import { loadRunner } from "../registry.js";
import { captureLogger, exists, runTests, withTempDir } from "./test_utils.js";

function partsDocument(): MockDocument {
  const doc = new MockDocument("Parts");
  const body = doc.addSolid("Body", "Body");
  doc.addSolid("Pad", "Pad").addParent(body);
  doc.addSolid("Box001", "Box");
  doc.addSolid("Cyl001", "Cylinder");
  doc.add({ id: "Sketch", capabilities: ["shape"] });
  doc.addPage("Page001", "Sheet");
  return doc;
}

async function runShape(
  type: "step" | "stl",
  objects: Selection,
  dir: string,
  logger: Logger,
  options: MockHostOptions = {}
) {
  const filename = `out/result.${type}`;
  const host = new MockHost(null, options);
  const runner = loadRunner({ type, filename, objects }, "outputs[0]", { baseDir: dir, logger });
  const outcome = await runner.run(partsDocument(), host);
  return { host, outcome, target: path.join(dir, filename) };
}

const tests = [
  {
    name: "step: every collected solid goes into one file",
    fn: async () => {
      await withTempDir(async (dir) => {
        const { logger, messages } = captureLogger();
        const { host, outcome, target } = await runShape(
          "step",
          { kind: "labels", labels: ["Box", "Cylinder", "Sheet"] },
          dir,
          logger
        );
        assert.deepEqual(outcome, { status: "written", path: target });
        assert.deepEqual(host.calls, ["step:Box001,Cyl001"]);
        assert.ok(messages("info").includes("Exporting 2 items as STEP to out/result.step"));
        assert.equal(
          await readFile(target, "utf8"),
          [
            "ISO-10303-21;",
            "HEADER;",
            "ENDSEC;",
            "DATA;",
            "#1=PRODUCT('Box','Box001');",
            "#2=PRODUCT('Cylinder','Cyl001');",
            "ENDSEC;",
            "END-ISO-10303-21;",
            "",
          ].join("\n")
        );
      });
    },
  },
  {
    name: "step: all shapes exports top-level solids only",
    fn: async () => {
      await withTempDir(async (dir) => {
        const { logger, messages } = captureLogger();
        const { host } = await runShape("step", { kind: "shapes" }, dir, logger);
        assert.deepEqual(host.calls, ["step:Body,Box001,Cyl001"]);
        assert.ok(messages("debug").includes("Object Sketch does not seem to be a solid"));
      });
    },
  },
  {
    name: "step: an empty export file is a failure",
    fn: async () => {
      await withTempDir(async (dir) => {
        const { logger } = captureLogger();
        const { outcome, target } = await runShape("step", { kind: "shapes" }, dir, logger, {
          failures: { step: "empty" },
        });
        assert.equal(outcome.status === "failed" ? outcome.error.code : outcome.status, "export_empty");
        assert.equal(await exists(target), false);
      });
    },
  },
  {
    name: "stl: a single object is exported",
    fn: async () => {
      await withTempDir(async (dir) => {
        const { logger } = captureLogger();
        const { host, outcome, target } = await runShape("stl", { kind: "labels", labels: ["Box"] }, dir, logger);
        assert.deepEqual(outcome, { status: "written", path: target });
        assert.deepEqual(host.calls, ["stl:Box001"]);
        assert.equal(await readFile(target, "utf8"), "solid Box\nendsolid Box\n");
      });
    },
  },
  {
    name: "stl: objects with a bare shape are accepted",
    fn: async () => {
      await withTempDir(async (dir) => {
        const { logger } = captureLogger();
        const { host, outcome } = await runShape("stl", { kind: "labels", labels: ["Sketch"] }, dir, logger);
        assert.equal(outcome.status, "written");
        assert.deepEqual(host.calls, ["stl:Sketch"]);
      });
    },
  },
  {
    name: "stl: more than one object is refused without exporting",
    fn: async () => {
      await withTempDir(async (dir) => {
        const { logger, records } = captureLogger();
        const { host, outcome, target } = await runShape(
          "stl",
          { kind: "labels", labels: ["Box", "Cylinder"] },
          dir,
          logger
        );
        assert.equal(outcome.status, "failed");
        if (outcome.status !== "failed") return;
        assert.equal(outcome.error.code, "stl_multiple_objects");
        assert.equal(outcome.error.message, "Only one object may be output to STL at a time");
        assert.deepEqual(outcome.error.details, { count: 2 });
        assert.deepEqual(host.calls, []);
        assert.equal(await exists(target), false);

        const error = records.find((r) => r.level === "error");
        assert.equal(error?.["count"], 2);
      });
    },
  },
  {
    name: "stl: exporter errors leave an existing file alone",
    fn: async () => {
      await withTempDir(async (dir) => {
        const { logger } = captureLogger();
        const first = await runShape("stl", { kind: "labels", labels: ["Box"] }, dir, logger);
        const before = await stat(first.target);

        const { outcome, target } = await runShape("stl", { kind: "labels", labels: ["Cylinder"] }, dir, logger, {
          failures: { stl: "throw" },
        });
        assert.equal(outcome.status, "failed");
        if (outcome.status !== "failed") return;
        assert.equal(outcome.error.message, "Failed to export to STL: mock stl export failed");
        assert.equal(await readFile(target, "utf8"), "solid Box\nendsolid Box\n");
        assert.equal((await stat(target)).mtimeMs, before.mtimeMs);
      });
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
