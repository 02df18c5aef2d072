#!/usr/bin/env node
import { stat } from "node:fs/promises";
import path from "node:path";
import { defaultOutputName, loadConfig } from "./config.js";
import { ConfigError, LaunchError, errorMessage } from "./errors.js";
import { buildManifest, type JobManifest } from "./job.js";
import { launchHost, type LaunchOptions, type LaunchResult } from "./launcher.js";
import { createLogger, type LogLevel, type Logger } from "./logging.js";
import { loadRunner } from "./registry.js";

export const NAME = "cadbot";
export const VERSION = "0.1.0";

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_CONFIG = 2;
export const EXIT_LAUNCH = 4;

const USAGE = `usage: ${NAME} [-c CONFIG] [-o OUTPUT] [-v] [-V] INPUT`;

export type CliOptions = {
  config: string;
  output?: string;
  verbose: number;
  version: boolean;
  input?: string;
};

export type CliDeps = {
  launch?: (manifest: JobManifest, options: LaunchOptions) => Promise<LaunchResult>;
  logger?: Logger;
  print?: (line: string) => void;
};

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { config: "cadbot.yaml", verbose: 0, version: false };

  const valueFor = (flag: string, value: string | undefined): string => {
    if (value === undefined || value.startsWith("-")) {
      throw new Error(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    switch (arg) {
      case "--config":
      case "-c":
        options.config = valueFor(arg, args[++i]);
        break;
      case "--output":
      case "-o":
        options.output = valueFor(arg, args[++i]);
        break;
      case "--verbose":
      case "-v":
        options.verbose += 1;
        break;
      case "-vv":
        options.verbose += 2;
        break;
      case "--version":
      case "-V":
        options.version = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new Error(`Unknown option: ${arg}`);
        }
        if (options.input !== undefined) {
          throw new Error(`Unexpected argument: ${arg}`);
        }
        options.input = arg;
    }
  }
  return options;
}

function verbosityLevel(verbose: number): LogLevel {
  if (verbose >= 2) return "debug";
  if (verbose === 1) return "info";
  return "warn";
}

export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));

  let args: CliOptions;
  try {
    args = parseArgs(argv);
  } catch (err) {
    print(`Error: ${errorMessage(err)}`);
    print(USAGE);
    return EXIT_USAGE;
  }

  if (args.version) {
    print(`${NAME} ${VERSION}`);
    return EXIT_OK;
  }
  if (!args.input) {
    print("Error: missing CAD input file");
    print(USAGE);
    return EXIT_USAGE;
  }

  const logger = deps.logger ?? createLogger({ level: verbosityLevel(args.verbose) });
  logger.info(`${NAME} started`);

  const configExists = await stat(args.config).then(
    (info) => info.isFile(),
    () => false
  );
  if (!configExists) {
    logger.error(`Configuration file ${args.config} not found`);
    return EXIT_USAGE;
  }

  try {
    const config = await loadConfig(args.config, logger);
    const outputDir = config.cadbot.outputDir ?? args.output;
    logger.debug(`Using output directory ${outputDir ?? process.cwd()}`);

    if (config.outputs.length === 0) {
      logger.warn("No outputs found in configuration file, exiting cleanly");
      return EXIT_OK;
    }

    const baseDir = outputDir ? path.resolve(outputDir) : null;
    const runners = config.outputs.map((spec, index) =>
      loadRunner(spec, defaultOutputName(index), { baseDir, logger })
    );

    const manifest = buildManifest(runners, {
      input: path.resolve(args.input),
      outputDir: baseDir,
      logLevel: config.cadbot.logLevel,
      paths: config.cadbot.paths,
    });

    const launch = deps.launch ?? launchHost;
    await launch(manifest, {
      hostCmd: config.cadbot.hostCmd,
      hostArgs: config.cadbot.hostArgs,
      timeoutMs: config.cadbot.timeoutMs,
      logger,
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error({ code: err.code, ...(err.details ?? {}) }, err.message);
      return EXIT_CONFIG;
    }
    if (err instanceof LaunchError) {
      logger.error({ code: err.code }, err.message);
      return EXIT_LAUNCH;
    }
    throw err;
  }

  logger.info(`${NAME} run complete`);
  return EXIT_OK;
}

// Only run main when executed directly
const isDirectRun =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("/cli.js") || process.argv[1].endsWith("/cli.ts"));
if (isDirectRun) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
