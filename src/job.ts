import { readFile } from "node:fs/promises";
import type { HostDocument } from "./document.js";
import { ConfigError, errorMessage } from "./errors.js";
import type { HostPrimitives } from "./host.js";
import {
  checkSchemaMajor,
  validateJobDescriptor,
  type JobDescriptor,
} from "./job_descriptor.js";
import {
  createLogger,
  parseLogLevel,
  type DestinationStream,
  type LogLevel,
  type Logger,
} from "./logging.js";
import { loadRunnerJson, type RunnerRegistry } from "./registry.js";
import type { OutputRunner, RunOutcome } from "./runner.js";
import {
  ensureArray,
  ensureNonEmptyString,
  ensureRecord,
  ensureStringArray,
  stableStringify,
} from "./validate.js";

export { JOB_SCHEMA, validateJobDescriptor } from "./job_descriptor.js";
export type { JobDescriptor } from "./job_descriptor.js";

export const MANIFEST_SCHEMA = "cadbot.manifest.v1";
const MANIFEST_SCHEMA_PREFIX = "cadbot.manifest.";

export type JobManifest = {
  schema: typeof MANIFEST_SCHEMA;
  createdAt: string;
  input: string;
  outputDir: string | null;
  logLevel: LogLevel;
  paths: string[];
  jobs: JobDescriptor[];
};

export type ManifestContext = {
  input: string;
  outputDir?: string | null;
  logLevel?: LogLevel;
  paths?: string[];
  createdAt?: string;
};

export type JobStatus = "written" | "empty" | "failed";

export type JobReport = {
  name: string;
  status: JobStatus;
  path?: string;
  error?: { code: string; message: string };
};

export type RunJobsOptions = {
  /** Overrides the logger built from the manifest's `logLevel`. */
  logger?: Logger;
  /** Where the manifest-level logger writes; stderr when unset. */
  logDestination?: DestinationStream;
  registry?: RunnerRegistry;
};

export type RehydrateOptions = {
  logger?: Logger;
  registry?: RunnerRegistry;
};

export function rehydrateRunner(
  descriptor: JobDescriptor,
  options: RehydrateOptions = {}
): OutputRunner<unknown> {
  return loadRunnerJson(descriptor.config, descriptor.name, descriptor.baseDir, options);
}

export function buildManifest(
  runners: readonly OutputRunner<unknown>[],
  ctx: ManifestContext
): JobManifest {
  const outputDir = ctx.outputDir ?? null;
  return {
    schema: MANIFEST_SCHEMA,
    createdAt: ctx.createdAt ?? new Date().toISOString(),
    input: ctx.input,
    outputDir,
    logLevel: ctx.logLevel ?? "info",
    paths: [...(ctx.paths ?? [])],
    jobs: runners.map((runner) => runner.emit(outputDir)),
  };
}

export function encodeManifest(manifest: JobManifest): string {
  return stableStringify(manifest);
}

export function parseManifest(text: string): JobManifest {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError("job_manifest_invalid", `Job manifest is not JSON: ${errorMessage(err)}`);
  }
  const raw = ensureRecord(data, "job_manifest_invalid", "Job manifest must be an object");
  const schema = ensureNonEmptyString(
    raw["schema"],
    "job_manifest_invalid",
    "Job manifest schema is required"
  );
  checkSchemaMajor(schema, MANIFEST_SCHEMA_PREFIX, 1, "Job manifest");

  const outputDir = raw["outputDir"];
  if (outputDir !== undefined && outputDir !== null && typeof outputDir !== "string") {
    throw new ConfigError("job_manifest_invalid", "Job manifest outputDir must be a string");
  }
  const jobs = ensureArray(raw["jobs"], "job_manifest_invalid", "Job manifest jobs must be an array");
  return {
    schema: MANIFEST_SCHEMA,
    createdAt: typeof raw["createdAt"] === "string" ? raw["createdAt"] : "",
    input: ensureNonEmptyString(raw["input"], "job_manifest_invalid", "Job manifest input is required"),
    outputDir: typeof outputDir === "string" ? outputDir : null,
    logLevel: typeof raw["logLevel"] === "string" ? parseLogLevel(raw["logLevel"]) : "info",
    paths:
      raw["paths"] === undefined
        ? []
        : ensureStringArray(raw["paths"], "job_manifest_invalid", "Job manifest paths must be strings"),
    jobs: jobs.map((job, index) => validateJobDescriptor(job, `jobs[${index}]`)),
  };
}

function toReport(name: string, outcome: RunOutcome): JobReport {
  switch (outcome.status) {
    case "written":
      return { name, status: "written", path: outcome.path };
    case "empty":
      return { name, status: "empty" };
    case "failed":
      return {
        name,
        status: "failed",
        error: { code: outcome.error.code, message: outcome.error.message },
      };
  }
}

/**
 * Host-side entry point. Every descriptor is rehydrated before anything runs,
 * so a bad descriptor aborts the batch before any export starts. Runners then
 * execute one at a time; a failed export is reported and the batch continues.
 */
export async function runJobs(
  manifest: JobManifest,
  doc: HostDocument,
  host: HostPrimitives,
  options: RunJobsOptions = {}
): Promise<JobReport[]> {
  const logger =
    options.logger ?? createLogger({ level: manifest.logLevel, destination: options.logDestination });
  const runners = manifest.jobs.map((job) =>
    rehydrateRunner(job, { logger, registry: options.registry })
  );
  logger.info(`Running ${runners.length} outputs against ${doc.name}`);

  const reports: JobReport[] = [];
  for (const runner of runners) {
    const outcome = await runner.run(doc, host);
    reports.push(toReport(runner.name, outcome));
  }

  const failed = reports.filter((report) => report.status === "failed").length;
  logger.info(`Run complete: ${reports.length - failed} of ${reports.length} outputs succeeded`);
  return reports;
}

export async function runJobFile(
  manifestPath: string,
  doc: HostDocument,
  host: HostPrimitives,
  options: RunJobsOptions = {}
): Promise<JobReport[]> {
  const manifest = parseManifest(await readFile(manifestPath, "utf8"));
  return runJobs(manifest, doc, host, options);
}
