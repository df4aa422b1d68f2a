export * from "./errors.js";
export * from "./config/settings.js";
export * from "./db/index.js";
export { Allocator, type AllocatorOptions } from "./services/port-allocator.js";
export { Pruner, fileSystemPaths, type PathChecker, type PrunerOptions } from "./services/pruner.js";
export {
  HostPortProbe,
  parseLsofOutput,
  parseNetstatOutput,
  parseSsOutput,
  type HostPortProbeOptions,
  type PortProbe,
} from "./services/system-probe.js";
export { buildContext, extractRepoName, getContext, hashIdentity } from "./services/context.js";
export {
  COMPOSE_FILE_NAMES,
  discoverServices,
  inferServiceType,
  parseComposeFile,
  parsePortDefinition,
  type DiscoverOptions,
} from "./services/discovery.js";
export { composeProjectName, envVarName, formatExport } from "./services/export.js";
export { direnvrcHelper, envrcSnippet } from "./services/direnv.js";
export { createLogger, silentLogger, type Logger } from "./utils/logger.js";
