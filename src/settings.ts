// src/settings.ts — Persisted user settings
// Defaults ← settings file ← CLI flags. The file is rewritten whole on every change.

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { ParsedArgs } from "./cli.js";
import type { Settings, SettingKey } from "./types.js";
import { SETTING_KEYS, SettingsError } from "./types.js";

export const CONFIG_DIR_NAME = "cmake-devkit";
export const CONFIG_FILE_NAME = "settings.json";

const PATH_KEYS = new Set<SettingKey>(["build_dir", "qt_prefix", "download_qt_output_dir"]);
const OPTIONAL_KEYS = new Set<SettingKey>([
  "qt_prefix",
  "generator",
  "download_qt_version",
  "download_qt_compiler",
]);

export interface SettingsLocation {
  platform: NodeJS.Platform;
  env: Record<string, string | undefined>;
  homeDir: string;
}

/**
 * Per-user settings file: %APPDATA% on Windows, $XDG_CONFIG_HOME or ~/.config elsewhere.
 */
export function settingsFilePath(location: SettingsLocation): string {
  const { platform, env, homeDir } = location;
  if (platform === "win32") {
    const base = env.APPDATA || env.LOCALAPPDATA;
    if (base) return join(base, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
  }
  if (env.XDG_CONFIG_HOME) {
    return join(env.XDG_CONFIG_HOME, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
  }
  return join(homeDir, ".config", CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

export function createDefaultSettings(projectRoot: string): Settings {
  const root = resolve(projectRoot);
  return {
    build_dir: join(root, "build"),
    build_type: "Debug",
    qt_prefix: null,
    generator: null,
    download_qt_output_dir: join(root, "third_party", "qt6"),
    download_qt_version: null,
    download_qt_compiler: null,
    default_run_targets: [],
  };
}

const KNOWN_KEYS: ReadonlySet<string> = new Set<string>(SETTING_KEYS);

export function isSettingKey(key: string): key is SettingKey {
  return KNOWN_KEYS.has(key);
}

export function expandHome(path: string, homeDir: string): string {
  if (path === "~") return homeDir;
  if (path.startsWith("~/") || path.startsWith("~\\")) return join(homeDir, path.slice(2));
  return path;
}

function splitTargetList(value: string): string[] {
  return value
    .replace(/;/g, ",")
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
}

/**
 * Normalize one raw value for `key`. Null or "" clears optional keys and
 * resets required ones; unusable list shapes fall back to the default.
 */
export function normalizeSetting<K extends SettingKey>(
  key: K,
  value: unknown,
  defaults: Settings,
  homeDir: string,
): Settings[K];
export function normalizeSetting(
  key: SettingKey,
  value: unknown,
  defaults: Settings,
  homeDir: string,
): Settings[SettingKey] {
  if (key === "default_run_targets") {
    if (typeof value === "string") return splitTargetList(value);
    if (Array.isArray(value)) {
      return value.map((item) => String(item).trim()).filter(Boolean);
    }
    return [...defaults.default_run_targets];
  }

  if (value === null || value === undefined || value === "") {
    return OPTIONAL_KEYS.has(key) ? null : defaults[key];
  }

  const text = String(value);
  if (PATH_KEYS.has(key)) return resolve(expandHome(text, homeDir));
  return text;
}

function assign<K extends SettingKey>(target: Settings, key: K, value: Settings[K]): void {
  target[key] = value;
}

function cloneSettings(settings: Settings): Settings {
  return { ...settings, default_run_targets: [...settings.default_run_targets] };
}

export interface SettingsStoreOptions {
  filePath: string;
  defaults: Settings;
  homeDir: string;
}

/**
 * Settings for one process. Built once by the CLI and passed to whatever needs it.
 *
 * Reads never throw: a missing, unreadable or malformed file means "use defaults".
 * Writes replace the whole file, so two concurrent invocations can drop each
 * other's changes to unrelated keys.
 */
export class SettingsStore {
  readonly filePath: string;
  private readonly defaults: Settings;
  private readonly homeDir: string;
  private current: Settings;

  constructor(options: SettingsStoreOptions) {
    this.filePath = options.filePath;
    this.defaults = cloneSettings(options.defaults);
    this.homeDir = options.homeDir;
    this.current = cloneSettings(options.defaults);
  }

  load(): Settings {
    this.current = this.merge(this.readOverrides());
    return this.snapshot();
  }

  /** A copy of one value; list settings cannot be edited through it. */
  get<K extends SettingKey>(key: K): Settings[K] {
    return cloneSettings(this.current)[key];
  }

  snapshot(): Settings {
    return cloneSettings(this.current);
  }

  set(updates: Record<string, unknown>, unsetKeys: Iterable<string> = []): Settings {
    const next = cloneSettings(this.current);
    for (const key of unsetKeys) {
      if (!isSettingKey(key)) continue;
      assign(next, key, cloneSettings(this.defaults)[key]);
    }
    for (const [key, value] of Object.entries(updates)) {
      if (!isSettingKey(key)) continue;
      assign(next, key, normalizeSetting(key, value, this.defaults, this.homeDir));
    }
    this.current = next;
    this.save();
    return this.snapshot();
  }

  defaultRunTargets(): string[] {
    return [...this.current.default_run_targets];
  }

  private save(): void {
    const sanitized: Record<string, unknown> = {};
    for (const key of SETTING_KEYS) {
      sanitized[key] = this.current[key];
    }
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(sanitized, null, 2) + "\n", "utf-8");
  }

  private readOverrides(): Record<string, unknown> {
    if (!existsSync(this.filePath)) return {};
    try {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, "utf-8"));
      if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) return {};
      return Object.fromEntries(Object.entries(parsed));
    } catch {
      // Corrupt or unreadable settings are treated as absent
      return {};
    }
  }

  private merge(overrides: Record<string, unknown>): Settings {
    const merged = cloneSettings(this.defaults);
    for (const [key, value] of Object.entries(overrides)) {
      if (!isSettingKey(key)) continue;
      assign(merged, key, normalizeSetting(key, value, this.defaults, this.homeDir));
    }
    return merged;
  }
}

/** Split a `KEY=VALUE` CLI assignment on the first "=". */
export function parseSettingAssignment(arg: string): [string, string] {
  const eq = arg.indexOf("=");
  if (eq === -1) {
    throw new SettingsError(`Invalid setting "${arg}": must be KEY=VALUE`);
  }
  return [arg.slice(0, eq).trim(), arg.slice(eq + 1).trim()];
}

export function formatSettings(settings: Settings, filePath: string): string {
  const lines = [`Settings file: ${filePath}`];
  for (const key of [...SETTING_KEYS].sort()) {
    lines.push(`  ${key}: ${JSON.stringify(settings[key])}`);
  }
  return lines.join("\n");
}

// ─── CLI defaults ───────────────────────────────────────────────────────────

export interface Invocation {
  buildDir: string;
  buildType: string;
  config?: string;
  qtPrefix?: string;
  generator?: string;
  downloadQtOutputDir: string;
  downloadQtVersion?: string;
  downloadQtCompiler?: string;
  downloadQtIfMissing: boolean;
}

/**
 * Fill in every option the user left off the command line from settings.
 */
export function resolveInvocation(args: ParsedArgs, settings: Settings, homeDir: string): Invocation {
  const path = (value: string | undefined, fallback: string) =>
    value ? resolve(expandHome(value, homeDir)) : fallback;

  return {
    buildDir: path(args.buildDir, settings.build_dir),
    buildType: args.buildType || settings.build_type,
    config: args.config,
    qtPrefix: args.qtPrefix ?? settings.qt_prefix ?? undefined,
    generator: args.generator ?? settings.generator ?? undefined,
    downloadQtOutputDir: path(args.downloadQtOutputDir, settings.download_qt_output_dir),
    downloadQtVersion: args.downloadQtVersion ?? settings.download_qt_version ?? undefined,
    downloadQtCompiler: args.downloadQtCompiler ?? settings.download_qt_compiler ?? undefined,
    downloadQtIfMissing: args.downloadQtIfMissing,
  };
}
