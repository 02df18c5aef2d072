import { spawn } from "node:child_process";
import { mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { LaunchError, errorMessage } from "./errors.js";
import { encodeManifest, type JobManifest } from "./job.js";
import { getDefaultLogger, type Logger } from "./logging.js";

export const MANIFEST_ENV = "CADBOT_MANIFEST";
export const PATHS_ENV = "CADBOT_PATHS";

export type LaunchOptions = {
  hostCmd: string;
  hostArgs?: string[];
  timeoutMs?: number;
  cwd?: string;
  env?: Record<string, string | undefined>;
  logger?: Logger;
};

export type LaunchResult = {
  exitCode: number;
  command: string[];
};

const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Writes the manifest to a temporary file and runs the host with the file as
 * its last argument. The manifest file is removed once the host exits, times
 * out or fails to start.
 */
export async function launchHost(manifest: JobManifest, options: LaunchOptions): Promise<LaunchResult> {
  const logger = options.logger ?? getDefaultLogger();
  const workDir = await mkdtemp(path.join(tmpdir(), "cadbot-job-"));
  const manifestPath = path.join(workDir, "manifest.json");
  try {
    logger.debug(`Writing job manifest to ${manifestPath}`);
    await writeFile(manifestPath, encodeManifest(manifest), "utf8");
    const info = await stat(manifestPath).catch(() => null);
    if (!info || info.size === 0) {
      throw new LaunchError("manifest_write_failed", `Job manifest ${manifestPath} is empty after writing`);
    }

    const command = [options.hostCmd, ...(options.hostArgs ?? []), manifestPath];
    logger.info(`Starting host with "${options.hostCmd}"`);
    logger.debug(`Full host command: ${command.join(" ")}`);
    const exitCode = await runHost(command, {
      cwd: options.cwd,
      env: {
        ...process.env,
        ...options.env,
        [MANIFEST_ENV]: manifestPath,
        [PATHS_ENV]: manifest.paths.join(path.delimiter),
      },
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });
    if (exitCode !== 0) {
      throw new LaunchError("host_exit", `Host exited with code ${exitCode}`);
    }
    return { exitCode, command };
  } finally {
    logger.debug(`Removing job manifest ${manifestPath}`);
    await rm(workDir, { recursive: true, force: true });
  }
}

type RunHostOptions = {
  cwd?: string;
  env: Record<string, string | undefined>;
  timeoutMs: number;
};

function runHost(command: string[], options: RunHostOptions): Promise<number> {
  const [cmd, ...args] = command;
  if (!cmd) {
    return Promise.reject(new LaunchError("host_cmd_missing", "Host command is empty"));
  }
  return new Promise((resolve, reject) => {
    let settled = false;
    const child = spawn(cmd, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: "inherit",
    });

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      child.kill("SIGKILL");
      reject(new LaunchError("host_timeout", `Host did not finish within ${options.timeoutMs}ms`));
    }, options.timeoutMs);

    child.once("error", (err) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      reject(new LaunchError("host_spawn_failed", `Failed to start host: ${errorMessage(err)}`));
    });

    child.once("exit", (code, signal) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      if (signal) {
        reject(new LaunchError("host_exit", `Host terminated by ${signal}`));
        return;
      }
      resolve(code ?? 0);
    });
  });
}
