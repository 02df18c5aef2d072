import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import { ConfigError, InvalidSpecError, errorMessage } from "./errors.js";
import { parseLogLevel, type LogLevel, type Logger } from "./logging.js";
import {
  ensureArray,
  ensureNonEmptyString,
  ensurePositiveInteger,
  ensureRecord,
  ensureStringArray,
  isRecord,
  optionalString,
} from "./validate.js";

export const CONFIG_VERSION = 1;
export const DEFAULT_HOST_CMD = "freecad";
export const DEFAULT_TIMEOUT_MS = 60_000;

export type Selection =
  | { kind: "labels"; labels: string[] }
  | { kind: "pages" }
  | { kind: "shapes" };

export type SelectionWire = string[] | { pages: "all" } | { shapes: "all" };

export type OutputSpec = {
  type: string;
  filename: string;
  objects: Selection;
  name?: string;
  comment?: string;
  options?: Record<string, unknown>;
};

/** An OutputSpec after the registry has settled its name. */
export type ResolvedOutputSpec = Readonly<OutputSpec & { name: string }>;

export type OutputSpecWire = {
  type: string;
  filename: string;
  objects: SelectionWire;
  name?: string;
  comment?: string;
  options?: Record<string, unknown>;
};

export type CadbotSettings = {
  version: number;
  hostCmd: string;
  hostArgs: string[];
  outputDir?: string;
  logLevel: LogLevel;
  timeoutMs: number;
  paths: string[];
};

export type CadbotConfig = {
  cadbot: CadbotSettings;
  outputs: OutputSpec[];
};

export function parseSelection(value: unknown, label = "objects"): Selection {
  if (Array.isArray(value)) {
    return {
      kind: "labels",
      labels: ensureStringArray(
        value,
        "config_selection_invalid",
        `${label} must be a list of object labels`
      ),
    };
  }
  if (isRecord(value)) {
    const pages = value["pages"] === "all";
    const shapes = value["shapes"] === "all";
    // Other keys are ignored; asking for both kinds is ambiguous.
    if (pages && !shapes) return { kind: "pages" };
    if (shapes && !pages) return { kind: "shapes" };
  }
  throw new InvalidSpecError(
    "config_selection_invalid",
    `${label} must be a list of labels, {pages: all} or {shapes: all}`
  );
}

export function selectionToWire(selection: Selection): SelectionWire {
  switch (selection.kind) {
    case "labels":
      return [...selection.labels];
    case "pages":
      return { pages: "all" };
    case "shapes":
      return { shapes: "all" };
  }
}

export function describeSelection(selection: Selection): string {
  switch (selection.kind) {
    case "labels":
      return `labels [${selection.labels.join(", ")}]`;
    case "pages":
      return "all pages";
    case "shapes":
      return "all shapes";
  }
}

export function validateOutputSpec(value: unknown, label = "output"): OutputSpec {
  const raw = ensureRecord(value, "config_output_invalid", `${label} must be a mapping`);
  const type = raw["type"];
  if (typeof type !== "string" || type.trim().length === 0) {
    throw new InvalidSpecError(
      "config_type_missing",
      `${label} must have "type" key set to a string`
    );
  }
  const filename = raw["filename"];
  if (typeof filename !== "string" || filename.trim().length === 0) {
    throw new InvalidSpecError(
      "config_filename_missing",
      `${label} must have "filename" key set to a string`
    );
  }
  if (raw["objects"] === undefined) {
    throw new InvalidSpecError("config_objects_missing", `${label} must have an "objects" key`);
  }

  const spec: OutputSpec = {
    type,
    filename,
    objects: parseSelection(raw["objects"], `${label}.objects`),
  };
  const name = optionalString(raw["name"], "config_output_name", `${label}.name must be a string`);
  if (name) spec.name = name;
  const comment = optionalString(
    raw["comment"],
    "config_output_comment",
    `${label}.comment must be a string`
  );
  if (comment) spec.comment = comment;
  if (raw["options"] !== undefined && raw["options"] !== null) {
    spec.options = {
      ...ensureRecord(raw["options"], "config_output_options", `${label}.options must be a mapping`),
    };
  }
  return spec;
}

export function outputSpecToWire(spec: OutputSpec): OutputSpecWire {
  const wire: OutputSpecWire = {
    type: spec.type,
    filename: spec.filename,
    objects: selectionToWire(spec.objects),
  };
  if (spec.name !== undefined) wire.name = spec.name;
  if (spec.comment !== undefined) wire.comment = spec.comment;
  if (spec.options !== undefined) wire.options = { ...spec.options };
  return wire;
}

export function resolveOutputSpec(spec: OutputSpec, defaultName: string): ResolvedOutputSpec {
  return Object.freeze({ ...spec, name: spec.name || defaultName });
}

export function defaultOutputName(index: number): string {
  return `outputs[${index}]`;
}

function parseSettings(value: unknown, logger: Logger): CadbotSettings {
  const settings: CadbotSettings = {
    version: CONFIG_VERSION,
    hostCmd: DEFAULT_HOST_CMD,
    hostArgs: [],
    logLevel: "info",
    timeoutMs: DEFAULT_TIMEOUT_MS,
    paths: [],
  };
  if (value === undefined || value === null) {
    logger.warn(
      `Missing "cadbot" key in configuration file, assuming configuration version ${CONFIG_VERSION}`
    );
    return settings;
  }

  const raw = ensureRecord(value, "config_settings_invalid", `"cadbot" must be a mapping`);
  if (raw["version"] === undefined || raw["version"] === null) {
    logger.warn(
      `Missing "cadbot.version" key in configuration file, assuming version ${CONFIG_VERSION}`
    );
  } else if (raw["version"] !== CONFIG_VERSION) {
    throw new ConfigError(
      "config_version_unsupported",
      `Configuration version ${String(raw["version"])} is not supported`,
      { supported: [CONFIG_VERSION] }
    );
  }

  if (raw["host_cmd"] !== undefined) {
    settings.hostCmd = ensureNonEmptyString(
      raw["host_cmd"],
      "config_host_cmd",
      `"cadbot.host_cmd" must be a non-empty string`
    );
  }
  if (raw["host_args"] !== undefined && raw["host_args"] !== null) {
    settings.hostArgs = ensureStringArray(
      raw["host_args"],
      "config_host_args",
      `"cadbot.host_args" must be a list of strings`
    );
  }
  const outputDir = optionalString(
    raw["output_dir"],
    "config_output_dir",
    `"cadbot.output_dir" must be a string`
  );
  if (outputDir) settings.outputDir = outputDir;
  if (raw["log_level"] !== undefined) {
    settings.logLevel = parseLogLevel(
      ensureNonEmptyString(raw["log_level"], "config_log_level", `"cadbot.log_level" must be a string`)
    );
  }
  if (raw["timeout_ms"] !== undefined) {
    settings.timeoutMs = ensurePositiveInteger(
      raw["timeout_ms"],
      "config_timeout",
      `"cadbot.timeout_ms" must be a positive integer`
    );
  }
  if (raw["paths"] !== undefined && raw["paths"] !== null) {
    settings.paths = ensureStringArray(
      raw["paths"],
      "config_paths",
      `"cadbot.paths" must be a list of strings`
    );
  }
  return settings;
}

export function parseConfig(data: unknown, logger: Logger): CadbotConfig {
  const root = ensureRecord(data, "config_not_mapping", "Configuration file must be a mapping");
  const cadbot = parseSettings(root["cadbot"], logger);
  const outputs: OutputSpec[] = [];
  if (root["outputs"] !== undefined && root["outputs"] !== null) {
    const entries = ensureArray(root["outputs"], "config_outputs_invalid", `"outputs" must be a list`);
    entries.forEach((entry, index) => {
      outputs.push(validateOutputSpec(entry, defaultOutputName(index)));
    });
  }
  return { cadbot, outputs };
}

export async function loadConfig(filename: string, logger: Logger): Promise<CadbotConfig> {
  logger.debug(`Loading configuration from ${filename}`);
  let text: string;
  try {
    text = await readFile(filename, "utf8");
  } catch (err) {
    throw new ConfigError("config_read_failed", `Failed to read configuration file: ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = yaml.load(text, { filename });
  } catch (err) {
    throw new ConfigError("config_parse_failed", `Failed to parse configuration file: ${errorMessage(err)}`);
  }
  return parseConfig(data, logger);
}
