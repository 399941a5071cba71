import Conf from "conf";
import { APP_DIR } from "./paths.js";
import { type Config, configSchema } from "./schema.js";

/**
 * Stored download defaults, kept as ~/.reelstitch/config.json by conf.
 */
export interface ConfigStore {
  load(): Config;
  update(updates: Partial<Config>): Config;
}

/**
 * Opens the configuration store in `dir`. Stored values are validated on
 * every read, so a hand-edited file with bad values fails loudly.
 */
export function openConfigStore(dir: string = APP_DIR): ConfigStore {
  const conf = new Conf<Config>({
    projectName: "reelstitch",
    cwd: dir,
    configName: "config",
    defaults: configSchema.parse({}),
  });

  const load = (): Config => configSchema.parse(conf.store);

  return {
    load,
    update: (updates) => {
      const updated = configSchema.parse({ ...load(), ...updates });
      conf.store = updated;
      return updated;
    },
  };
}

let defaultStore: ConfigStore | undefined;

function getStore(): ConfigStore {
  defaultStore ??= openConfigStore();
  return defaultStore;
}

/**
 * Loads the application configuration with defaults applied.
 */
export function loadConfig(): Config {
  return getStore().load();
}

/**
 * Updates specific config values.
 */
export function updateConfig(updates: Partial<Config>): Config {
  return getStore().update(updates);
}

export function getConfigValue<K extends keyof Config>(key: K): Config[K] {
  return loadConfig()[key];
}
