// src/targets.ts — Runnable target discovery and built-executable lookup
// Targets are re-listed from the build backend on every invocation; nothing is cached.

import { existsSync, readFileSync, statSync } from "node:fs";
import { basename, join } from "node:path";
import { findFirstFile } from "./fs-walk.js";
import type { Host, Warning } from "./types.js";
import { ExecutableNotFoundError } from "./types.js";

export const CMAKE_CACHE_FILE = "CMakeCache.txt";

const MULTI_CONFIG_MARKERS = ["Visual Studio", "Xcode", "Multi-Config"];
const CACHE_GENERATOR_KEY = "CMAKE_GENERATOR:INTERNAL=";
const CACHE_CONFIG_TYPES_KEY = "CMAKE_CONFIGURATION_TYPES";

/** Aggregate and housekeeping targets that never produce an executable. */
export const NON_RUN_TARGETS: ReadonlySet<string> = new Set([
  "all",
  "ALL_BUILD",
  "RUN_TESTS",
  "test",
  "install",
  "help",
  "clean",
  "ZERO_CHECK",
  "depend",
  "edit_cache",
  "rebuild_cache",
  "list_install_components",
]);

const NON_RUN_SUFFIXES = [".o", ".obj", ".i", ".s", ".ninja"];
const EXECUTABLE_RULE_MARKER = "_EXECUTABLE_LINKER";

/**
 * Whether a listed name could be an executable target: not housekeeping,
 * not a path, not an object, preprocessed or assembly file.
 */
export function isRunnableTargetName(name: string): boolean {
  if (!name || NON_RUN_TARGETS.has(name)) return false;
  if (/[\s/\\]/.test(name)) return false;
  return !NON_RUN_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

function readCache(buildDir: string): string | undefined {
  const cache = join(buildDir, CMAKE_CACHE_FILE);
  if (!existsSync(cache)) return undefined;
  try {
    return readFileSync(cache, "utf-8");
  } catch {
    return undefined;
  }
}

/**
 * Multi-config when the generator name says so, or when the configure step
 * recorded CMAKE_CONFIGURATION_TYPES in the cache.
 */
export function isMultiConfigGenerator(generator: string | undefined, buildDir: string): boolean {
  if (generator && MULTI_CONFIG_MARKERS.some((marker) => generator.includes(marker))) return true;
  return readCache(buildDir)?.includes(CACHE_CONFIG_TYPES_KEY) ?? false;
}

export function readGeneratorFromCache(buildDir: string): string | undefined {
  const text = readCache(buildDir);
  if (text === undefined) return undefined;
  for (const line of text.split(/\r?\n/)) {
    if (line.startsWith(CACHE_GENERATOR_KEY)) {
      return line.slice(CACHE_GENERATOR_KEY.length).trim();
    }
  }
  return undefined;
}

/** --config value: an explicit override, else the build type for multi-config builds. */
export function effectiveConfig(
  buildDir: string,
  generator: string | undefined,
  buildType: string,
  configOverride: string | undefined,
): string | undefined {
  if (configOverride) return configOverride;
  return isMultiConfigGenerator(generator, buildDir) ? buildType : undefined;
}

// ─── Backend listings ────────────────────────────────────────────────────────

/**
 * `ninja -t targets all` prints "name: rule" per line. When the listing has
 * executable link steps only those count, named by the file they produce.
 */
export function parseNinjaTargets(output: string): string[] {
  const linked: string[] = [];
  const named: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    const colon = line.indexOf(":");
    if (colon < 0) continue;
    const name = line.slice(0, colon).trim();
    const rule = line.slice(colon + 1).trim();
    if (rule.includes(EXECUTABLE_RULE_MARKER)) {
      const file = basename(name.replace(/\\/g, "/"));
      linked.push(file.toLowerCase().endsWith(".exe") ? file.slice(0, -4) : file);
    } else if (isRunnableTargetName(name)) {
      named.push(name);
    }
  }
  return linked.length > 0 ? linked : named;
}

/**
 * `cmake --build <dir> --target help`: Makefiles print "... name", other
 * generators print "name: description".
 */
export function parseCMakeHelpTargets(output: string): string[] {
  const targets: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    let candidate: string;
    if (line.startsWith("...")) {
      candidate = line.slice(3).trim().split(" ")[0];
    } else if (line.includes(":")) {
      candidate = line.split(":", 1)[0].trim();
    } else {
      continue;
    }
    // Prose lines ("The following are some of the valid targets...:") are not names
    if (isRunnableTargetName(candidate)) targets.push(candidate);
  }
  return targets;
}

function listTargetsWithNinja(host: Host, buildDir: string): string[] {
  if (!host.which("ninja")) return [];
  const output = host.capture(["ninja", "-C", buildDir, "-t", "targets", "all"]);
  return output ? parseNinjaTargets(output) : [];
}

function listTargetsWithCMake(host: Host, buildDir: string, config: string | undefined): string[] {
  const argv = ["cmake", "--build", buildDir, "--target", "help"];
  if (config) argv.push("--config", config);
  const output = host.capture(argv);
  return output ? parseCMakeHelpTargets(output) : [];
}

export interface TargetQuery {
  buildDir: string;
  generator?: string;
  buildType: string;
  configOverride?: string;
}

/**
 * Targets the backend reports, minus housekeeping and file-like entries,
 * followed by the configured fallbacks. Order is first-seen; duplicates are
 * dropped.
 */
export function discoverRunnableTargets(
  host: Host,
  query: TargetQuery,
  fallbackTargets: readonly string[] = [],
): string[] {
  const { buildDir, buildType, configOverride } = query;
  const generator = query.generator || readGeneratorFromCache(buildDir) || "";
  const config = effectiveConfig(buildDir, generator, buildType, configOverride);

  const found = generator.includes("Ninja")
    ? listTargetsWithNinja(host, buildDir)
    : listTargetsWithCMake(host, buildDir, config);

  const seen = new Set<string>();
  const cleaned: string[] = [];
  for (const name of [...found, ...fallbackTargets]) {
    if (!isRunnableTargetName(name) || seen.has(name)) continue;
    seen.add(name);
    cleaned.push(name);
  }
  return cleaned;
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

export function executableName(target: string, platform: NodeJS.Platform): string {
  return platform === "win32" ? `${target}.exe` : target;
}

/**
 * Find the built executable for `target`: the usual output locations first,
 * then the first match of a sorted recursive search under the build directory.
 */
export function locateBuiltExecutable(
  query: TargetQuery & { target: string; platform: NodeJS.Platform },
  warnings: Warning[] = [],
): string {
  const { buildDir, target, generator, buildType, configOverride, platform } = query;
  const exeName = executableName(target, platform);
  const config = effectiveConfig(buildDir, generator, buildType, configOverride);

  const candidates = [join(buildDir, exeName), join(buildDir, target, exeName)];
  if (config) {
    candidates.push(join(buildDir, config, exeName), join(buildDir, config, target, exeName));
  }
  for (const candidate of candidates) {
    // build/<target> is a directory, not the binary, when outputs are nested per target
    if (isFile(candidate)) return candidate;
  }

  const match = existsSync(buildDir) ? findFirstFile(buildDir, exeName, warnings) : undefined;
  if (match) return match;

  throw new ExecutableNotFoundError(target, buildDir);
}
