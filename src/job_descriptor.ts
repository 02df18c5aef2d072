import { ConfigError } from "./errors.js";
import { ensureNonEmptyString, ensureRecord } from "./validate.js";

export const JOB_SCHEMA = "cadbot.job.v1";
const JOB_SCHEMA_PREFIX = "cadbot.job.";
const JOB_SCHEMA_MAJOR = 1;

/**
 * Pure-data form of a runner. `config` is the JSON wire form of the output
 * spec; `name` is the resolved runner name. Carries no object references, so
 * it can cross a process boundary unchanged.
 */
export type JobDescriptor = {
  schema: typeof JOB_SCHEMA;
  config: string;
  name: string;
  baseDir: string | null;
};

export function validateJobDescriptor(value: unknown, label = "job"): JobDescriptor {
  const raw = ensureRecord(value, "job_descriptor_invalid", `${label} must be an object`);
  const schema = ensureNonEmptyString(
    raw["schema"],
    "job_descriptor_schema",
    `${label}.schema must be a string`
  );
  checkSchemaMajor(schema, JOB_SCHEMA_PREFIX, JOB_SCHEMA_MAJOR, label);
  const config = ensureNonEmptyString(
    raw["config"],
    "job_descriptor_config",
    `${label}.config must be a serialized output spec`
  );
  const name = ensureNonEmptyString(raw["name"], "job_descriptor_name", `${label}.name must be a string`);
  const baseDir = raw["baseDir"];
  if (baseDir !== undefined && baseDir !== null && typeof baseDir !== "string") {
    throw new ConfigError("job_descriptor_base_dir", `${label}.baseDir must be a string or null`);
  }
  return {
    schema: JOB_SCHEMA,
    config,
    name,
    baseDir: typeof baseDir === "string" ? baseDir : null,
  };
}

/**
 * Schemas are `<prefix>v<major>` with an optional `.<minor>` suffix. Only the
 * major version has to match; newer minors add fields that are ignored here.
 */
export function checkSchemaMajor(
  schema: string,
  prefix: string,
  major: number,
  label: string
): void {
  const match = schema.startsWith(prefix)
    ? /^v(\d+)(?:\.\d+)?$/.exec(schema.slice(prefix.length))
    : null;
  if (!match || Number(match[1]) !== major) {
    throw new ConfigError(
      "job_schema_unsupported",
      `${label} schema ${schema} is not supported (expected ${prefix}v${major})`
    );
  }
}
