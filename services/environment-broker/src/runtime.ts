import { loadBrokerSettings, type BrokerSettings } from "./config/settings.js";
import {
  EnvironmentManager,
  type EnvironmentManagerOptions,
} from "./environments/EnvironmentManager.js";
import { ConfigWatcherService } from "./fs/ConfigWatcherService.js";
import { appLogger } from "./observability/logger.js";
import { createEnvironmentTools, type EnvironmentTools } from "./tools/environmentTools.js";

export interface EnvironmentRuntime {
  manager: EnvironmentManager;
  tools: EnvironmentTools;
  watcher?: ConfigWatcherService;
  stop(): Promise<void>;
}

export type StartRuntimeOptions = EnvironmentManagerOptions & {
  createWatcher?: (manager: EnvironmentManager, settings: BrokerSettings) => ConfigWatcherService;
};

function defaultWatcher(manager: EnvironmentManager, settings: BrokerSettings): ConfigWatcherService {
  return new ConfigWatcherService({
    structuredPath: settings.structuredPath,
    legacyPath: settings.legacyPath,
    debounceMs: settings.watch.debounceMs,
    onChange: (structuredPath, legacyPath) => manager.reload(structuredPath, legacyPath),
  });
}

/**
 * Build the process's single EnvironmentManager, load configuration and
 * activate the default environment. Load failures propagate so the host
 * never starts serving without a valid configuration.
 */
export async function startEnvironmentRuntime(
  settings: BrokerSettings = loadBrokerSettings(),
  options: StartRuntimeOptions = {},
): Promise<EnvironmentRuntime> {
  const { createWatcher = defaultWatcher, ...managerOptions } = options;
  const manager = new EnvironmentManager(managerOptions);

  await manager.load(settings.structuredPath, settings.legacyPath);
  await manager.activateDefault();

  let watcher: ConfigWatcherService | undefined;
  if (settings.watch.enabled) {
    watcher = createWatcher(manager, settings);
    watcher.start();
  } else {
    appLogger.info("configuration hot reload disabled");
  }

  return {
    manager,
    tools: createEnvironmentTools(manager),
    watcher,
    async stop() {
      await watcher?.stop();
    },
  };
}
