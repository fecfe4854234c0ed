import Conf from "conf";
import { ensureDir } from "../shared/fs.js";
import { APP_DIR, CACHE_DIR, SESSIONS_DIR } from "./paths.js";
import { type Config, type ConfigKey, configSchema } from "./schema.js";

export interface ConfigManager {
  /** Validated config with defaults applied */
  load: () => Config;
  save: (config: Config) => Config;
  get: <K extends ConfigKey>(key: K) => Config[K];
  readonly path: string;
}

/**
 * Configuration kept in `config.json` inside dir, using the conf package
 * for atomic writes. A value that fails the schema is reported, not dropped.
 */
export function createConfigManager(dir: string = APP_DIR): ConfigManager {
  const store = new Conf<Config>({
    projectName: "coursekeep",
    cwd: dir,
    configName: "config",
    defaults: configSchema.parse({}),
  });

  const load = (): Config => {
    const parsed = configSchema.safeParse(store.store);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new Error(`Invalid configuration in ${store.path}: ${issues}`);
    }
    return parsed.data;
  };

  const save = (config: Config): Config => {
    const validated = configSchema.parse(config);
    store.store = validated;
    return validated;
  };

  return {
    load,
    save,
    get: (key) => load()[key],
    path: store.path,
  };
}

// ============================================
// Application store under ~/.coursekeep
// ============================================

let appConfig: ConfigManager | undefined;

function app(): ConfigManager {
  appConfig ??= createConfigManager();
  return appConfig;
}

/**
 * Ensures all required application directories exist.
 */
export async function ensureAppDirectories(): Promise<void> {
  await Promise.all([APP_DIR, SESSIONS_DIR, CACHE_DIR].map((dir) => ensureDir(dir)));
}

export function loadConfig(): Config {
  return app().load();
}

export function saveConfig(config: Config): Config {
  return app().save(config);
}

export function getConfigValue<K extends ConfigKey>(key: K): Config[K] {
  return app().get(key);
}

export function getConfigPath(): string {
  return app().path;
}
