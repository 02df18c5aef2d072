export {
  CONFIG_VERSION,
  defaultOutputName,
  describeSelection,
  loadConfig,
  outputSpecToWire,
  parseConfig,
  parseSelection,
  resolveOutputSpec,
  selectionToWire,
  validateOutputSpec,
} from "./config.js";
export type {
  CadbotConfig,
  CadbotSettings,
  OutputSpec,
  OutputSpecWire,
  ResolvedOutputSpec,
  Selection,
  SelectionWire,
} from "./config.js";
export {
  collect,
  collectLabels,
  collectPages,
  collectShapes,
  findTopParents,
} from "./collect.js";
export type { CollectContext, ItemCheck } from "./collect.js";
export { PAGE_TYPE_ID, describeObject, hasCapability, isDrawingPage } from "./document.js";
export type {
  HostDocument,
  HostObject,
  ObjectCapability,
  ObjectId,
  ParentEdge,
} from "./document.js";
export type { CameraType, HostPrimitives, HostView, ViewPreset } from "./host.js";
export {
  ConfigError,
  ExecutionError,
  InvalidSpecError,
  LaunchError,
  UnsupportedTypeError,
} from "./errors.js";
export { createLogger, parseLogLevel, runnerLogger } from "./logging.js";
export type { LogLevel, Logger, LoggerOptions } from "./logging.js";
export { OutputRunner, executionFailure, verifyExport } from "./runner.js";
export type {
  CommitOptions,
  ExecuteResult,
  ExportProducer,
  RunOutcome,
  RunnerConstructor,
  RunnerOptions,
  RunnerState,
} from "./runner.js";
export {
  RunnerRegistry,
  createDefaultRegistry,
  getDefaultRegistry,
  loadRunner,
  loadRunnerJson,
} from "./registry.js";
export type { LoadRunnerOptions } from "./registry.js";
export * from "./outputs/index.js";
export {
  JOB_SCHEMA,
  MANIFEST_SCHEMA,
  buildManifest,
  encodeManifest,
  parseManifest,
  rehydrateRunner,
  runJobFile,
  runJobs,
  validateJobDescriptor,
} from "./job.js";
export type {
  JobDescriptor,
  JobManifest,
  JobReport,
  JobStatus,
  ManifestContext,
  RunJobsOptions,
} from "./job.js";
export { MANIFEST_ENV, PATHS_ENV, launchHost } from "./launcher.js";
export type { LaunchOptions, LaunchResult } from "./launcher.js";
export { MockDocument, MockHost, MockObject, MockView } from "./mock_host.js";
export type { MockFailure, MockHostOptions, MockObjectInit, MockPrimitive } from "./mock_host.js";
