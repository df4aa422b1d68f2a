import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { SettingsError } from "../errors.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const SettingsFileSchema = z.object({
  databasePath: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  probe: z
    .object({
      timeoutMs: z.number().int().positive().optional(),
      host: z.string().min(1).optional(),
    })
    .optional(),
  prune: z
    .object({
      staleDays: z.number().int().positive().optional(),
    })
    .optional(),
});

export interface ProbeSettings {
  timeoutMs: number;
  host: string;
}

export interface Settings {
  dataDir: string;
  databasePath: string;
  logFile: string;
  logLevel: LogLevel;
  /** Log records go to stderr instead of the log file */
  debug: boolean;
  probe: ProbeSettings;
  prune: { staleDays: number };
}

export const SETTINGS_FILE_NAME = "config.yaml";

const DEFAULT_PROBE_TIMEOUT_MS = 5000;
const DEFAULT_STALE_DAYS = 30;

function isTruthy(value: string | undefined): boolean {
  return ["1", "true", "yes"].includes((value ?? "").toLowerCase());
}

/**
 * Per-user data directory, following each platform's convention
 */
export function defaultDataDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string {
  if (env.DEVPORTS_HOME) {
    return env.DEVPORTS_HOME;
  }

  const home = env.HOME ?? homedir();

  if (platform === "darwin") {
    return join(home, "Library", "Application Support", "devports");
  }
  if (platform === "win32") {
    return join(env.APPDATA ?? join(home, "AppData", "Roaming"), "devports");
  }
  return join(env.XDG_DATA_HOME ?? join(home, ".local", "share"), "devports");
}

function readSettingsFile(path: string): z.infer<typeof SettingsFileSchema> {
  if (!existsSync(path)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new SettingsError(
      `Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty file loads as undefined
  const parsed = SettingsFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SettingsError(`Invalid settings in ${path}: ${issues}`);
  }
  return parsed.data;
}

function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new SettingsError(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Resolve settings from the settings file and the environment.
 * Environment variables take precedence over the file.
 */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): Settings {
  const dataDir = defaultDataDir(env, platform);
  const file = readSettingsFile(join(dataDir, SETTINGS_FILE_NAME));

  const debug = isTruthy(env.DEVPORTS_DEBUG);

  let logLevel: LogLevel = file.logLevel ?? (debug ? "debug" : "info");
  if (env.DEVPORTS_LOG_LEVEL) {
    const level = z.enum(LOG_LEVELS).safeParse(env.DEVPORTS_LOG_LEVEL);
    if (!level.success) {
      throw new SettingsError(`Unknown log level '${env.DEVPORTS_LOG_LEVEL}'`);
    }
    logLevel = level.data;
  }

  return {
    dataDir,
    databasePath: env.DEVPORTS_DB_PATH || file.databasePath || join(dataDir, "registry.db"),
    logFile: join(dataDir, "devports.log"),
    logLevel,
    debug,
    probe: {
      timeoutMs:
        parsePositiveInt("DEVPORTS_PROBE_TIMEOUT_MS", env.DEVPORTS_PROBE_TIMEOUT_MS) ??
        file.probe?.timeoutMs ??
        DEFAULT_PROBE_TIMEOUT_MS,
      host: file.probe?.host ?? "127.0.0.1",
    },
    prune: {
      staleDays: file.prune?.staleDays ?? DEFAULT_STALE_DAYS,
    },
  };
}
