import { copyFile, mkdir, mkdtemp, rename, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { collect } from "./collect.js";
import {
  outputSpecToWire,
  type ResolvedOutputSpec,
  type Selection,
} from "./config.js";
import type { HostDocument, HostObject } from "./document.js";
import { ExecutionError, errorMessage } from "./errors.js";
import type { HostPrimitives } from "./host.js";
import { JOB_SCHEMA, type JobDescriptor } from "./job_descriptor.js";
import { getDefaultLogger, runnerLogger, type Logger } from "./logging.js";

export type RunnerOptions = {
  baseDir?: string | null;
  logger?: Logger;
};

export type RunnerConstructor = new (
  spec: ResolvedOutputSpec,
  options?: RunnerOptions
) => OutputRunner<unknown>;

export type ExecuteResult =
  | { ok: true; path: string }
  | { ok: false; error: ExecutionError };

export type RunOutcome =
  | { status: "empty" }
  | { status: "written"; path: string }
  | { status: "failed"; error: ExecutionError };

export type RunnerState = "idle" | "collecting" | "executing" | "done";

export type CommitOptions = {
  requireNonEmpty?: boolean;
};

/** Produces the export inside `exportDir` and returns the file it wrote. */
export type ExportProducer = (exportDir: string) => Promise<string>;

export function executionFailure(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ExecuteResult {
  return { ok: false, error: new ExecutionError(code, message, details) };
}

/**
 * Base class for output runners. Variants override `checkItem`, `loadOptions`
 * and `execute`; everything else is shared.
 */
export abstract class OutputRunner<TOptions = undefined> {
  protected readonly log: Logger;
  private readonly resolved: ResolvedOutputSpec;
  private readonly baseDirectory: string | null;
  private readonly parsedOptions: TOptions | undefined;
  private currentState: RunnerState = "idle";

  constructor(spec: ResolvedOutputSpec, options: RunnerOptions = {}) {
    this.resolved = spec;
    this.baseDirectory = options.baseDir ?? null;
    this.log = runnerLogger(options.logger ?? getDefaultLogger(), spec.name);
    this.parsedOptions = spec.options ? this.loadOptions(spec.options) : undefined;
  }

  get spec(): ResolvedOutputSpec {
    return this.resolved;
  }

  get name(): string {
    return this.resolved.name;
  }

  get type(): string {
    return this.resolved.type.toLowerCase();
  }

  get filename(): string {
    return this.resolved.filename;
  }

  get comment(): string | undefined {
    return this.resolved.comment;
  }

  get selection(): Selection {
    return this.resolved.objects;
  }

  get options(): TOptions | undefined {
    return this.parsedOptions;
  }

  get baseDir(): string | null {
    return this.baseDirectory;
  }

  get state(): RunnerState {
    return this.currentState;
  }

  /** Whether this runner can export `obj`. Accepts everything by default. */
  checkItem(_obj: HostObject): boolean {
    return true;
  }

  protected loadOptions(_raw: Record<string, unknown>): TOptions | undefined {
    return undefined;
  }

  protected abstract execute(
    doc: HostDocument,
    items: HostObject[],
    host: HostPrimitives
  ): Promise<ExecuteResult>;

  /**
   * Resolves `filename` against the base directory (or the working directory)
   * and creates missing parent directories. Returns null when the path exists
   * but is not a regular file.
   */
  async checkOutputFile(filename: string): Promise<string | null> {
    const absPath = this.baseDirectory
      ? path.resolve(this.baseDirectory, filename)
      : path.resolve(filename);

    const outDir = path.dirname(absPath);
    if (!(await pathExists(outDir))) {
      this.log.info(`Output directory ${outDir} does not exist and will be created`);
      await mkdir(outDir, { recursive: true });
    }

    const existing = await stat(absPath).catch(() => null);
    if (existing && !existing.isFile()) {
      this.log.error(`Output file ${absPath} is not a file`);
      return null;
    }
    if (existing) {
      this.log.warn(`Output file ${absPath} exists and will be overwritten`);
    }
    return absPath;
  }

  collect(doc: HostDocument): HostObject[] {
    return collect(doc, this.resolved.objects, {
      checkItem: (obj) => this.checkItem(obj),
      logger: this.log,
    });
  }

  async run(doc: HostDocument, host: HostPrimitives): Promise<RunOutcome> {
    if (this.currentState !== "idle") {
      throw new Error(`${this.toString()} has already run`);
    }
    this.log.info(this.comment ? `Running ${this.name} (${this.comment})` : `Running ${this.name}`);

    try {
      this.currentState = "collecting";
      const items = this.collect(doc);
      if (items.length === 0) {
        this.log.warn("No items were collected for processing");
        return { status: "empty" };
      }
      this.log.debug(
        `Collected ${items.length} objects for processing: [${items.map((i) => i.label).join(", ")}]`
      );

      this.currentState = "executing";
      const result = await this.execute(doc, items, host);
      if (!result.ok) {
        this.log.error(
          { code: result.error.code, ...(result.error.details ?? {}) },
          result.error.message
        );
        return { status: "failed", error: result.error };
      }
      this.log.info(`Completed, wrote ${result.path}`);
      return { status: "written", path: result.path };
    } finally {
      this.currentState = "done";
    }
  }

  /**
   * Write-verify-then-commit. The producer writes into a private temporary
   * directory; the file it reports is verified, copied next to the final path
   * and renamed into place. The temporary directory is removed on every exit.
   * Errors thrown while producing or committing become an ExecuteResult.
   */
  protected async exportWithCommit(
    produce: ExportProducer,
    opts: CommitOptions = {}
  ): Promise<ExecuteResult> {
    const target = await this.checkOutputFile(this.filename);
    if (!target) {
      return executionFailure("output_path_invalid", `Cannot write output to ${this.filename}`);
    }

    const exportDir = await mkdtemp(path.join(tmpdir(), "cadbot-"));
    this.log.debug(`Using temporary export directory ${exportDir}`);
    try {
      const exported = await produce(exportDir);
      const problem = await verifyExport(exported, opts.requireNonEmpty ?? false);
      if (problem) return { ok: false, error: problem };

      this.log.debug(`Committing ${exported} to ${target}`);
      await commitFile(exported, target, path.basename(exportDir));
      return { ok: true, path: target };
    } catch (err) {
      if (err instanceof ExecutionError) return { ok: false, error: err };
      return executionFailure(
        "export_failed",
        `Failed to export to ${this.type.toUpperCase()}: ${errorMessage(err)}`
      );
    } finally {
      await rm(exportDir, { recursive: true, force: true });
    }
  }

  emit(baseDir?: string | null): JobDescriptor {
    return {
      schema: JOB_SCHEMA,
      config: JSON.stringify(outputSpecToWire(this.resolved)),
      name: this.name,
      baseDir: baseDir ?? this.baseDirectory,
    };
  }

  toString(): string {
    return `<${this.constructor.name} ${this.name}>`;
  }
}

async function pathExists(p: string): Promise<boolean> {
  return stat(p).then(
    () => true,
    () => false
  );
}

export async function verifyExport(
  file: string,
  requireNonEmpty: boolean
): Promise<ExecutionError | null> {
  const info = await stat(file).catch(() => null);
  if (!info || !info.isFile()) {
    return new ExecutionError("export_missing", `Host did not generate export file ${file}`, {
      file,
    });
  }
  if (requireNonEmpty && info.size === 0) {
    return new ExecutionError("export_empty", `Host generated an empty export file ${file}`, {
      file,
    });
  }
  return null;
}

/** Stages beside `target` under a name unique to this export, then renames into place. */
async function commitFile(source: string, target: string, tag: string): Promise<void> {
  const staging = `${target}.${tag}.partial`;
  try {
    await copyFile(source, staging);
    await rename(staging, target);
  } catch (err) {
    await rm(staging, { force: true });
    throw err;
  }
}
