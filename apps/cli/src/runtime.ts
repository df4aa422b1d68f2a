import {
  Allocator,
  HostPortProbe,
  Pruner,
  Registry,
  createLogger,
  loadSettings,
  type Logger,
  type Settings,
} from "@devports/core";

export interface Runtime {
  settings: Settings;
  logger: Logger;
  registry: Registry;
  probe: HostPortProbe;
  allocator: Allocator;
  pruner: Pruner;
}

let runtime: Runtime | null = null;

/**
 * Registry, allocator and pruner for this invocation, built on first use
 */
export function getRuntime(): Runtime {
  if (!runtime) {
    const settings = loadSettings();
    const logger = createLogger(settings);
    const registry = new Registry({ path: settings.databasePath, logger });
    const probe = new HostPortProbe({ ...settings.probe, logger });

    runtime = {
      settings,
      logger,
      registry,
      probe,
      allocator: new Allocator(registry, probe, { logger }),
      pruner: new Pruner(registry, { logger }),
    };
  }
  return runtime;
}
