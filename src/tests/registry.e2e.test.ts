import assert from "node:assert/strict";
import type { OutputSpec } from "../config.js";
import type { HostDocument, HostObject } from "../document.js";
import { ConfigError, InvalidSpecError, UnsupportedTypeError } from "../errors.js";
import type { HostPrimitives } from "../host.js";
import {
  PdfOutputRunner,
  ScreenshotOutputRunner,
  StepOutputRunner,
  StlOutputRunner,
} from "../outputs/index.js";
import { RunnerRegistry, createDefaultRegistry, loadRunner, loadRunnerJson } from "../registry.js";
import { OutputRunner, type ExecuteResult, type RunnerConstructor } from "../runner.js";
import { captureLogger, runTests } from "./test_utils.js";

class NullOutputRunner extends OutputRunner {
  protected async execute(
    _doc: HostDocument,
    _items: HostObject[],
    _host: HostPrimitives
  ): Promise<ExecuteResult> {
    return { ok: true, path: this.filename };
  }
}

function codeOf(err: unknown): string | undefined {
  return err instanceof ConfigError ? err.code : undefined;
}

const screenshotOptions = {
  camera: "Orthographic",
  view: "Isometric",
  resolution: [640, 480],
};

const tests = [
  {
    name: "registry: type tags are matched case-insensitively",
    fn: async () => {
      const { logger } = captureLogger();
      const registry = createDefaultRegistry();
      const cases: Array<[string, RunnerConstructor]> = [
        ["PDF", PdfOutputRunner],
        ["Step", StepOutputRunner],
        ["stl", StlOutputRunner],
        ["SCREENSHOT", ScreenshotOutputRunner],
      ];
      for (const [type, ctor] of cases) {
        const runner = registry.create(
          { type, filename: "out", objects: { kind: "shapes" }, options: screenshotOptions },
          "outputs[0]",
          { logger }
        );
        assert.ok(runner instanceof ctor, `${type} should build ${ctor.name}`);
        assert.equal(runner.type, type.toLowerCase());
      }
    },
  },
  {
    name: "registry: default name is applied without touching the input spec",
    fn: async () => {
      const { logger } = captureLogger();
      const spec: OutputSpec = { type: "pdf", filename: "a.pdf", objects: { kind: "pages" } };
      const runner = loadRunner(spec, "outputs[4]", { logger, baseDir: "/srv/out" });
      assert.equal(runner.name, "outputs[4]");
      assert.equal(runner.baseDir, "/srv/out");
      assert.equal(spec.name, undefined);

      const named = loadRunner({ ...spec, name: "sheets" }, "outputs[4]", { logger });
      assert.equal(named.name, "sheets");
      assert.equal(named.baseDir, null);
    },
  },
  {
    name: "registry: unknown type lists the supported tags",
    fn: async () => {
      const { logger } = captureLogger();
      assert.throws(
        () => loadRunner({ type: "dxf", filename: "a.dxf", objects: { kind: "pages" } }, "outputs[0]", { logger }),
        (err: unknown) => {
          assert.ok(err instanceof UnsupportedTypeError);
          assert.equal(err.code, "config_type_unsupported");
          assert.equal(err.message, 'Output type "dxf" is not supported');
          assert.equal(err.outputType, "dxf");
          assert.deepEqual(err.details?.["supported"], ["pdf", "screenshot", "step", "stl"]);
          return true;
        }
      );
    },
  },
  {
    name: "registry: blank type is an invalid spec",
    fn: async () => {
      const { logger } = captureLogger();
      assert.throws(
        () => loadRunner({ type: "", filename: "a", objects: { kind: "pages" } }, "outputs[1]", { logger }),
        (err: unknown) =>
          err instanceof InvalidSpecError &&
          err.code === "config_type_missing" &&
          err.message === 'Output outputs[1] must have "type" key set to a string'
      );
    },
  },
  {
    name: "registry: custom registries accept new tags",
    fn: async () => {
      const { logger } = captureLogger();
      const registry = new RunnerRegistry().register(" Null ", NullOutputRunner);
      assert.equal(registry.has("NULL"), true);
      assert.equal(registry.has("pdf"), false);
      assert.deepEqual(registry.types(), ["null"]);

      const runner = loadRunner({ type: "null", filename: "x", objects: { kind: "labels", labels: ["A"] } }, "outputs[0]", {
        logger,
        registry,
      });
      assert.ok(runner instanceof NullOutputRunner);
      assert.throws(
        () => registry.register("  ", NullOutputRunner),
        (err: unknown) => codeOf(err) === "registry_tag_empty"
      );
    },
  },
  {
    name: "registry: JSON entry point rebuilds from the wire form",
    fn: async () => {
      const { logger } = captureLogger();
      const runner = loadRunnerJson(
        JSON.stringify({ type: "step", filename: "parts.step", objects: { shapes: "all" } }),
        "outputs[2]",
        "/srv/out",
        { logger }
      );
      assert.ok(runner instanceof StepOutputRunner);
      assert.equal(runner.name, "outputs[2]");
      assert.equal(runner.baseDir, "/srv/out");
      assert.deepEqual(runner.selection, { kind: "shapes" });
    },
  },
  {
    name: "registry: JSON entry point rejects malformed input",
    fn: async () => {
      const { logger } = captureLogger();
      assert.throws(
        () => loadRunnerJson("{not json", "outputs[0]", null, { logger }),
        (err: unknown) => codeOf(err) === "config_json_invalid"
      );
      assert.throws(
        () => loadRunnerJson(JSON.stringify({ type: "pdf", objects: ["A"] }), "outputs[0]", null, { logger }),
        { message: 'outputs[0] must have "filename" key set to a string' }
      );
    },
  },
  {
    name: "registry: screenshot requires valid options",
    fn: async () => {
      const { logger } = captureLogger();
      const base = { type: "screenshot", filename: "shot.png", objects: { kind: "shapes" } } as const;
      assert.throws(
        () => loadRunner({ ...base }, "outputs[0]", { logger }),
        (err: unknown) => codeOf(err) === "screenshot_options_missing"
      );
      assert.throws(
        () => loadRunner({ ...base, options: { ...screenshotOptions, camera: "fisheye" } }, "outputs[0]", { logger }),
        (err: unknown) => codeOf(err) === "screenshot_camera"
      );
      assert.throws(
        () => loadRunner({ ...base, options: { ...screenshotOptions, view: "sideways" } }, "outputs[0]", { logger }),
        (err: unknown) => codeOf(err) === "screenshot_view"
      );
      assert.throws(
        () => loadRunner({ ...base, options: { ...screenshotOptions, resolution: [640] } }, "outputs[0]", { logger }),
        (err: unknown) => codeOf(err) === "screenshot_resolution"
      );
    },
  },
  {
    name: "registry: screenshot options are normalized",
    fn: async () => {
      const { logger } = captureLogger();
      const runner = loadRunner(
        { type: "screenshot", filename: "shot.png", objects: { kind: "shapes" }, options: screenshotOptions },
        "outputs[0]",
        { logger }
      );
      assert.ok(runner instanceof ScreenshotOutputRunner);
      assert.deepEqual(runner.options, {
        camera: "orthographic",
        view: "isometric",
        resolution: [640, 480],
        background: "transparent",
      });
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
