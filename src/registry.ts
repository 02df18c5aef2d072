import {
  resolveOutputSpec,
  validateOutputSpec,
  type OutputSpec,
} from "./config.js";
import { ConfigError, InvalidSpecError, UnsupportedTypeError, errorMessage } from "./errors.js";
import {
  PdfOutputRunner,
  ScreenshotOutputRunner,
  StepOutputRunner,
  StlOutputRunner,
} from "./outputs/index.js";
import type { OutputRunner, RunnerConstructor, RunnerOptions } from "./runner.js";

/** Maps lower-cased output type tags to runner classes. */
export class RunnerRegistry {
  private ctors = new Map<string, RunnerConstructor>();

  register(tag: string, ctor: RunnerConstructor): this {
    const key = tag.trim().toLowerCase();
    if (!key) {
      throw new InvalidSpecError("registry_tag_empty", "Output type tag must be a non-empty string");
    }
    this.ctors.set(key, ctor);
    return this;
  }

  has(tag: string): boolean {
    return this.ctors.has(tag.trim().toLowerCase());
  }

  types(): string[] {
    return [...this.ctors.keys()].sort();
  }

  /**
   * Builds the runner for `spec`. The name is settled here, once: the spec's
   * own name or `defaultName`. The input spec is left untouched.
   */
  create(spec: OutputSpec, defaultName: string, options: RunnerOptions = {}): OutputRunner<unknown> {
    const resolved = resolveOutputSpec(spec, defaultName);
    if (typeof resolved.type !== "string" || resolved.type.trim().length === 0) {
      throw new InvalidSpecError(
        "config_type_missing",
        `Output ${resolved.name} must have "type" key set to a string`
      );
    }
    const ctor = this.ctors.get(resolved.type.trim().toLowerCase());
    if (!ctor) {
      throw new UnsupportedTypeError(resolved.type, this.types());
    }
    return new ctor(resolved, options);
  }
}

export function createDefaultRegistry(): RunnerRegistry {
  return new RunnerRegistry()
    .register("pdf", PdfOutputRunner)
    .register("step", StepOutputRunner)
    .register("stl", StlOutputRunner)
    .register("screenshot", ScreenshotOutputRunner);
}

let defaultRegistry: RunnerRegistry | null = null;

export function getDefaultRegistry(): RunnerRegistry {
  if (!defaultRegistry) defaultRegistry = createDefaultRegistry();
  return defaultRegistry;
}

export type LoadRunnerOptions = RunnerOptions & {
  registry?: RunnerRegistry;
};

export function loadRunner(
  spec: OutputSpec,
  defaultName: string,
  options: LoadRunnerOptions = {}
): OutputRunner<unknown> {
  const { registry, ...runnerOptions } = options;
  return (registry ?? getDefaultRegistry()).create(spec, defaultName, runnerOptions);
}

/**
 * Rebuilds a runner from the JSON wire form of its output spec. This is the
 * entry point the host process uses for every job descriptor.
 */
export function loadRunnerJson(
  serializedConfig: string,
  defaultName: string,
  baseDir?: string | null,
  options: Omit<LoadRunnerOptions, "baseDir"> = {}
): OutputRunner<unknown> {
  let data: unknown;
  try {
    data = JSON.parse(serializedConfig);
  } catch (err) {
    throw new ConfigError("config_json_invalid", `Serialized output config is not JSON: ${errorMessage(err)}`);
  }
  const spec = validateOutputSpec(data, defaultName);
  return loadRunner(spec, defaultName, { ...options, baseDir: baseDir ?? null });
}
