import assert from "node:assert/strict";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import {
  DEFAULT_HOST_CMD,
  DEFAULT_TIMEOUT_MS,
  loadConfig,
  outputSpecToWire,
  parseConfig,
  parseSelection,
  resolveOutputSpec,
  validateOutputSpec,
  type OutputSpec,
} from "../config.js";
import { ConfigError, InvalidSpecError } from "../errors.js";
import { parseLogLevel } from "../logging.js";
import { captureLogger, runTests, withTempDir } from "./test_utils.js";

function codeOf(err: unknown): string | undefined {
  return err instanceof ConfigError ? err.code : undefined;
}

const tests = [
  {
    name: "config: selection wire forms map to tagged variants",
    fn: async () => {
      assert.deepEqual(parseSelection(["Body", "Pad"]), { kind: "labels", labels: ["Body", "Pad"] });
      assert.deepEqual(parseSelection({ pages: "all" }), { kind: "pages" });
      assert.deepEqual(parseSelection({ shapes: "all" }), { kind: "shapes" });
    },
  },
  {
    name: "config: malformed selections are rejected",
    fn: async () => {
      for (const bad of [{ pages: "some" }, { pages: "all", shapes: "all" }, "Body", [1, 2], null]) {
        assert.throws(
          () => parseSelection(bad),
          (err: unknown) => codeOf(err) === "config_selection_invalid"
        );
      }
    },
  },
  {
    name: "config: extra keys beside pages or shapes are ignored",
    fn: async () => {
      assert.deepEqual(parseSelection({ pages: "all", filter: "A*" }), { kind: "pages" });
      assert.deepEqual(parseSelection({ shapes: "all", note: "x" }), { kind: "shapes" });
    },
  },
  {
    name: "config: output spec validation keeps optional fields",
    fn: async () => {
      const spec = validateOutputSpec({
        type: "PDF",
        filename: "drawings/all.pdf",
        objects: { pages: "all" },
        name: "drawings",
        comment: "Every sheet",
        options: { dpi: 300 },
      });
      assert.deepEqual(spec, {
        type: "PDF",
        filename: "drawings/all.pdf",
        objects: { kind: "pages" },
        name: "drawings",
        comment: "Every sheet",
        options: { dpi: 300 },
      });
      assert.deepEqual(outputSpecToWire(spec), {
        type: "PDF",
        filename: "drawings/all.pdf",
        objects: { pages: "all" },
        name: "drawings",
        comment: "Every sheet",
        options: { dpi: 300 },
      });
    },
  },
  {
    name: "config: missing type, filename or objects is an invalid spec",
    fn: async () => {
      const cases: Array<[unknown, string]> = [
        [{ filename: "a.pdf", objects: ["A"] }, "config_type_missing"],
        [{ type: "  ", filename: "a.pdf", objects: ["A"] }, "config_type_missing"],
        [{ type: "pdf", objects: ["A"] }, "config_filename_missing"],
        [{ type: "pdf", filename: "a.pdf" }, "config_objects_missing"],
      ];
      for (const [value, code] of cases) {
        assert.throws(
          () => validateOutputSpec(value, "outputs[3]"),
          (err: unknown) => err instanceof InvalidSpecError && err.code === code
        );
      }
    },
  },
  {
    name: "config: resolving the name leaves the input spec untouched",
    fn: async () => {
      const spec: OutputSpec = { type: "stl", filename: "a.stl", objects: { kind: "shapes" } };
      const resolved = resolveOutputSpec(spec, "outputs[2]");
      assert.equal(resolved.name, "outputs[2]");
      assert.equal(spec.name, undefined);
      assert.ok(Object.isFrozen(resolved));

      const named = resolveOutputSpec({ ...spec, name: "mesh" }, "outputs[2]");
      assert.equal(named.name, "mesh");
    },
  },
  {
    name: "config: defaults and warnings when the cadbot section is missing",
    fn: async () => {
      const { logger, messages } = captureLogger();
      const config = parseConfig(
        { outputs: [{ type: "step", filename: "a.step", objects: { shapes: "all" } }] },
        logger
      );
      assert.equal(config.cadbot.hostCmd, DEFAULT_HOST_CMD);
      assert.equal(config.cadbot.timeoutMs, DEFAULT_TIMEOUT_MS);
      assert.equal(config.cadbot.logLevel, "info");
      assert.equal(config.outputs.length, 1);
      assert.deepEqual(messages("warn"), [
        'Missing "cadbot" key in configuration file, assuming configuration version 1',
      ]);
    },
  },
  {
    name: "config: unsupported version is rejected",
    fn: async () => {
      const { logger } = captureLogger();
      assert.throws(
        () => parseConfig({ cadbot: { version: 2 }, outputs: [] }, logger),
        (err: unknown) => codeOf(err) === "config_version_unsupported"
      );
    },
  },
  {
    name: "config: output errors name the positional default",
    fn: async () => {
      const { logger } = captureLogger();
      assert.throws(
        () =>
          parseConfig(
            {
              cadbot: { version: 1 },
              outputs: [
                { type: "pdf", filename: "a.pdf", objects: { pages: "all" } },
                { type: "pdf", objects: { pages: "all" } },
              ],
            },
            logger
          ),
        { message: 'outputs[1] must have "filename" key set to a string' }
      );
    },
  },
  {
    name: "config: loads YAML from disk",
    fn: async () => {
      await withTempDir(async (dir) => {
        const file = path.join(dir, "cadbot.yaml");
        await writeFile(
          file,
          [
            "cadbot:",
            "  version: 1",
            "  host_cmd: freecadcmd",
            "  host_args: ['--safe-mode']",
            "  output_dir: build",
            "  log_level: WARNING",
            "  timeout_ms: 5000",
            "  paths: [/opt/lib]",
            "outputs:",
            "  - type: pdf",
            "    filename: drawings.pdf",
            "    objects:",
            "      pages: all",
            "  - type: stl",
            "    filename: bracket.stl",
            "    name: bracket",
            "    objects: [Bracket]",
            "",
          ].join("\n")
        );
        const { logger, messages } = captureLogger();
        const config = await loadConfig(file, logger);
        assert.deepEqual(config.cadbot, {
          version: 1,
          hostCmd: "freecadcmd",
          hostArgs: ["--safe-mode"],
          outputDir: "build",
          logLevel: "warn",
          timeoutMs: 5000,
          paths: ["/opt/lib"],
        });
        assert.deepEqual(
          config.outputs.map((o) => o.objects),
          [{ kind: "pages" }, { kind: "labels", labels: ["Bracket"] }]
        );
        assert.equal(config.outputs[1]?.name, "bracket");
        assert.deepEqual(messages("warn"), []);
      });
    },
  },
  {
    name: "config: YAML that is not a mapping is rejected",
    fn: async () => {
      await withTempDir(async (dir) => {
        const file = path.join(dir, "cadbot.yaml");
        await writeFile(file, "- just\n- a list\n");
        const { logger } = captureLogger();
        await assert.rejects(loadConfig(file, logger), (err: unknown) => codeOf(err) === "config_not_mapping");
      });
    },
  },
  {
    name: "config: log levels accept common aliases",
    fn: async () => {
      assert.equal(parseLogLevel("DEBUG"), "debug");
      assert.equal(parseLogLevel("warning"), "warn");
      assert.equal(parseLogLevel("critical"), "fatal");
      assert.throws(() => parseLogLevel("loud"), (err: unknown) => codeOf(err) === "config_log_level");
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
