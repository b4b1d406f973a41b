// src/environment-probe.ts — Generator, compiler flavor and Qt prefix detection
// Precedence everywhere: explicit CLI value → environment variable → filesystem/PATH heuristics.
// "Not found" is a valid answer (undefined); only a Qt/toolchain flavor conflict is fatal.

import { existsSync, readdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { findDirectories } from "./fs-walk.js";
import { pathListDelimiter } from "./host.js";
import { compilerInstallHint } from "./package-hints.js";
import { expandHome } from "./settings.js";
import type {
  CompilerReport,
  Host,
  ResolvedEnvironment,
  SdkCandidate,
  ToolchainFlavor,
  Warning,
} from "./types.js";
import { ToolchainMismatchError } from "./types.js";
import { compareVersionTuples, parseVersionFromPathSegments } from "./version.js";

// ─── Constants ───────────────────────────────────────────────────────────────

const QT_CMAKE_MARKER = "**/lib/cmake/Qt6";
const VS_INSTALL_ENV_MARKERS = ["VCToolsInstallDir", "VCINSTALLDIR", "VSINSTALLDIR"];
const VSWHERE_BASE_ARGS = ["-latest", "-products", "*", "-requires", "Microsoft.Component.MSBuild"];
const MISSING_TOOLCHAIN_HINT =
  "Install MSVC Build Tools or MinGW-w64 and ensure cl.exe/g++.exe is available.";

export const VSWHERE_INSTALL_HELP =
  "vswhere.exe not found. Install Visual Studio (or the free Build Tools 2022) " +
  "so vswhere.exe is placed under Program Files (x86)/Microsoft Visual Studio/Installer, " +
  "or add an existing vswhere.exe to PATH.";

// ─── Pure helpers ────────────────────────────────────────────────────────────

function pathSegments(path: string): string[] {
  return path.split(/[\\/]/).filter(Boolean);
}

function executableBasename(path: string): string {
  return (pathSegments(path).pop() ?? "").toLowerCase();
}

/** "mingw" or "msvc" from path segments of a Qt install, e.g. .../6.8.0/mingw_64. */
export function detectSdkFlavor(path: string): ToolchainFlavor | undefined {
  const lower = pathSegments(path).map((part) => part.toLowerCase());
  if (lower.some((part) => part.includes("mingw"))) return "mingw";
  if (lower.some((part) => part.includes("msvc"))) return "msvc";
  return undefined;
}

export function generatorForVisualStudioMajor(major: number): string | undefined {
  if (major >= 17) return "Visual Studio 17 2022";
  if (major === 16) return "Visual Studio 16 2019";
  return undefined;
}

function flavorFromGenerator(generator: string): ToolchainFlavor | undefined {
  const gen = generator.toLowerCase();
  if (gen.includes("visual studio") || gen.includes("msvc")) return "msvc";
  if (gen.includes("mingw")) return "mingw";
  return undefined;
}

function flavorFromCompilerName(compiler: string): ToolchainFlavor | undefined {
  const name = executableBasename(compiler);
  if (name === "cl" || name === "cl.exe" || name.includes("msvc")) return "msvc";
  if (name.includes("mingw") || name.startsWith("g++") || name.startsWith("gcc")) return "mingw";
  return undefined;
}

export function uniqueExistingPaths(paths: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const path of paths) {
    const resolved = resolve(path);
    if (seen.has(resolved) || !existsSync(resolved)) continue;
    seen.add(resolved);
    result.push(resolved);
  }
  return result;
}

/** Every ancestor of `path`, nearest first, excluding `path` itself. */
function ancestors(path: string): string[] {
  const result: string[] = [];
  let current = resolve(path);
  for (let parent = dirname(current); parent !== current; parent = dirname(parent)) {
    result.push(parent);
    current = parent;
  }
  return result;
}

/**
 * Library directories of an MSVC install: the newest VC/Tools/MSVC/<ver>/lib
 * tree under `root`, plus lib, lib/x64 and lib/x86 of every ancestor.
 */
export function msvcLibraryDirsFromRoot(root: string): string[] {
  const candidates: string[] = [];
  const vcTools = join(root, "VC", "Tools", "MSVC");
  if (existsSync(vcTools)) {
    const versions = readdirSync(vcTools).sort();
    const newest = versions.at(-1);
    if (newest) {
      const lib = join(vcTools, newest, "lib");
      candidates.push(lib, join(lib, "x64"), join(lib, "x86"));
    }
  }
  for (const parent of ancestors(root)) {
    const lib = join(parent, "lib");
    candidates.push(lib, join(lib, "x64"), join(lib, "x86"));
  }
  return uniqueExistingPaths(candidates);
}

/** Parse the `libraries: =a:b:c` line of `gcc -print-search-dirs`. */
export function parseSearchDirs(output: string, platform: NodeJS.Platform): string[] {
  for (const line of output.split(/\r?\n/)) {
    if (!line.toLowerCase().startsWith("libraries:")) continue;
    const eq = line.indexOf("=");
    if (eq === -1) return [];
    return line
      .slice(eq + 1)
      .trim()
      .split(pathListDelimiter(platform))
      .filter((p) => p.trim());
  }
  return [];
}

/**
 * Library directories for a gcc/clang-style compiler: ask it first, else guess
 * from the layout around the executable.
 */
export function compilerLibraryDirs(host: Host, compilerPath: string | undefined): string[] {
  if (!compilerPath) return [];
  const output = host.capture([compilerPath, "-print-search-dirs"]);
  const reported = output ? parseSearchDirs(output, host.platform) : [];
  if (reported.length > 0) return uniqueExistingPaths(reported);

  const binDir = dirname(resolve(compilerPath));
  return uniqueExistingPaths([
    join(binDir, "lib"),
    join(dirname(binDir), "lib"),
    join(dirname(binDir), "lib64"),
  ]);
}

/** lib, lib64 and Lib directories that exist under a Qt prefix. */
export function sdkLibraryDirs(prefix: string): string[] {
  return ["lib", "lib64", "Lib"]
    .map((name) => join(prefix, name))
    .filter((dir) => existsSync(dir));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Probe ───────────────────────────────────────────────────────────────────

export interface VisualStudioInstall {
  installationPath?: string;
  installationVersion?: string;
}

export interface EnvironmentProbeOptions {
  host: Host;
  projectRoot: string;
  /** Where vendored Qt builds live (default: <projectRoot>/third_party/qt6). */
  sdkRoot?: string;
}

/**
 * Stateless apart from the one-time vswhere hint: every resolve call
 * re-reads the environment and filesystem.
 */
export class EnvironmentProbe {
  readonly warnings: Warning[] = [];
  readonly sdkRoot: string;
  private readonly host: Host;
  private vswhereHintEmitted = false;

  constructor(options: EnvironmentProbeOptions) {
    this.host = options.host;
    this.sdkRoot = options.sdkRoot ?? join(resolve(options.projectRoot), "third_party", "qt6");
  }

  private get isWindows(): boolean {
    return this.host.platform === "win32";
  }

  // ─── Generator ─────────────────────────────────────────────────────────────

  /**
   * CLI value → $CMAKE_GENERATOR → Visual Studio (Windows, via vswhere) →
   * Ninja on PATH → undefined (let CMake pick).
   */
  resolveGenerator(cliValue?: string): string | undefined {
    if (cliValue) return cliValue;
    const fromEnv = this.host.env.CMAKE_GENERATOR;
    if (fromEnv) return fromEnv;
    if (this.isWindows) {
      const vsGenerator = this.detectVisualStudioGenerator();
      if (vsGenerator) return vsGenerator;
    }
    if (this.host.which("ninja")) return "Ninja";
    return undefined;
  }

  detectVisualStudioGenerator(): string | undefined {
    const version = this.visualStudioInstall()?.installationVersion;
    if (!version) return undefined;
    const major = parseInt(version.split(".", 1)[0], 10);
    if (isNaN(major)) return undefined;
    return generatorForVisualStudioMajor(major);
  }

  // ─── Visual Studio installer queries ───────────────────────────────────────

  vswherePath(): string | undefined {
    const programFiles = this.host.env["ProgramFiles(x86)"];
    if (!programFiles) return undefined;
    const path = join(programFiles, "Microsoft Visual Studio", "Installer", "vswhere.exe");
    return existsSync(path) ? path : undefined;
  }

  /** Whether the missing-vswhere hint has been emitted by this probe. */
  get vswhereHintShown(): boolean {
    return this.vswhereHintEmitted;
  }

  private warnMissingVswhere(): void {
    if (this.vswhereHintEmitted || !this.isWindows) return;
    this.vswhereHintEmitted = true;
    this.warnings.push({ level: "warn", module: "environment-probe", message: VSWHERE_INSTALL_HELP });
  }

  /** Latest Visual Studio with MSBuild, as reported by `vswhere -format json`. */
  visualStudioInstall(): VisualStudioInstall | undefined {
    if (!this.isWindows) return undefined;
    const vswhere = this.vswherePath();
    if (!vswhere) {
      this.warnMissingVswhere();
      return undefined;
    }

    const output = this.host.capture([vswhere, ...VSWHERE_BASE_ARGS, "-format", "json"]);
    if (!output) return undefined;

    let data: unknown;
    try {
      data = JSON.parse(output);
    } catch {
      this.warnings.push({ level: "info", module: "environment-probe", message: "vswhere returned malformed JSON" });
      return undefined;
    }
    if (!Array.isArray(data) || data.length === 0) return undefined;
    const entry: unknown = data[0];
    if (!isRecord(entry)) return undefined;

    return {
      installationPath: typeof entry.installationPath === "string" ? entry.installationPath : undefined,
      installationVersion: typeof entry.installationVersion === "string" ? entry.installationVersion : undefined,
    };
  }

  /**
   * A Visual Studio toolchain counts even when cl.exe is not on PATH, so MSVC
   * wins over incidental MinGW tools (e.g. the g++ bundled with Strawberry Perl).
   */
  hasVisualStudioInstall(): boolean {
    if (VS_INSTALL_ENV_MARKERS.some((name) => this.host.env[name])) return true;
    const vswhere = this.vswherePath();
    if (!vswhere) {
      this.warnMissingVswhere();
      return false;
    }
    const output = this.host.capture([vswhere, ...VSWHERE_BASE_ARGS, "-property", "installationVersion"]);
    return Boolean(output?.trim());
  }

  // ─── Compiler flavor ───────────────────────────────────────────────────────

  /**
   * Best-effort Windows toolchain flavor, used to match Qt binaries.
   * Always undefined off Windows.
   */
  resolveCompilerFlavor(generator?: string): ToolchainFlavor | undefined {
    if (!this.isWindows) return undefined;

    const fromGenerator = flavorFromGenerator(generator || this.host.env.CMAKE_GENERATOR || "");
    if (fromGenerator) return fromGenerator;

    for (const name of ["CXX", "CC"]) {
      const compiler = this.host.env[name];
      if (!compiler) continue;
      const flavor = flavorFromCompilerName(compiler);
      if (flavor) return flavor;
    }

    if (this.hasVisualStudioInstall()) return "msvc";
    if (this.host.which("cl")) return "msvc";
    if (this.host.which("g++")) return "mingw";
    return undefined;
  }

  // ─── Qt prefix ─────────────────────────────────────────────────────────────

  /**
   * CLI value → $QT_PREFIX_PATH → first $CMAKE_PREFIX_PATH entry (each only if
   * it exists) → vendored Qt autodetection. Undefined lets CMake search system Qt.
   */
  resolveSdkPrefix(cliValue?: string, generator?: string): string | undefined {
    const candidates = [cliValue, this.host.env.QT_PREFIX_PATH];
    const cmakePrefixes = this.host.env.CMAKE_PREFIX_PATH;
    if (cmakePrefixes) {
      candidates.push(cmakePrefixes.split(pathListDelimiter(this.host.platform))[0]);
    }

    for (const value of candidates) {
      if (!value) continue;
      const path = resolve(expandHome(value, this.host.homeDir));
      if (existsSync(path)) return path;
    }

    return this.autodetectSdkPrefix(this.resolveCompilerFlavor(generator));
  }

  /** Every <prefix>/lib/cmake/Qt6 under the vendored Qt root, in walk order. */
  findSdkCandidates(): SdkCandidate[] {
    if (!existsSync(this.sdkRoot)) return [];
    return findDirectories(this.sdkRoot, QT_CMAKE_MARKER, this.warnings).map((markerDir) => {
      const prefix = dirname(dirname(dirname(markerDir)));
      return {
        prefix,
        version: parseVersionFromPathSegments(prefix),
        flavor: detectSdkFlavor(prefix),
      };
    });
  }

  /**
   * Highest-versioned vendored Qt, preferring builds whose flavor matches the
   * compiler. Falls back to the highest version of any flavor.
   */
  autodetectSdkPrefix(preferredFlavor?: ToolchainFlavor): string | undefined {
    const candidates = this.findSdkCandidates();
    if (candidates.length === 0) return undefined;

    if (preferredFlavor) {
      const matching = pickHighest(candidates.filter((c) => c.flavor === preferredFlavor));
      if (matching) return matching.prefix;
    }
    return pickHighest(candidates)?.prefix;
  }

  /**
   * Throw when the Qt build and the active toolchain are known to disagree
   * (MSVC Qt with MinGW or the reverse). Mixing them only fails much later, at link time.
   */
  enforceToolchainMatch(sdkPrefix: string | undefined, generator?: string): void {
    if (!sdkPrefix || !this.isWindows) return;
    const compilerFlavor = this.resolveCompilerFlavor(generator);
    const qtFlavor = detectSdkFlavor(sdkPrefix);
    if (compilerFlavor && qtFlavor && compilerFlavor !== qtFlavor) {
      throw new ToolchainMismatchError(sdkPrefix, qtFlavor, compilerFlavor);
    }
  }

  // ─── Compiler report ───────────────────────────────────────────────────────

  /** Locate a usable C++ compiler for the `verify` report. */
  describeCompiler(generator?: string): CompilerReport {
    for (const name of ["CXX", "CC"]) {
      const compiler = this.host.env[name];
      if (!compiler) continue;
      const resolved = this.host.which(compiler) ?? (existsSync(compiler) ? compiler : undefined);
      if (resolved) {
        return {
          description: `${resolved} (from $${name})`,
          libraryDirs: compilerLibraryDirs(this.host, resolved),
        };
      }
      return { hint: `$${name} points to ${compiler}, but it is not executable.`, libraryDirs: [] };
    }

    if (this.isWindows) return this.describeWindowsCompiler(generator);

    for (const candidate of ["c++", "g++", "clang++"]) {
      const path = this.host.which(candidate);
      if (path) {
        return { description: `${candidate} at ${path}`, libraryDirs: compilerLibraryDirs(this.host, path) };
      }
    }
    return { hint: compilerInstallHint(this.host), libraryDirs: [] };
  }

  private describeWindowsCompiler(generator?: string): CompilerReport {
    const preferred = this.resolveCompilerFlavor(generator);
    const clPath = this.host.which("cl");
    const gxxPath = this.host.which("g++");

    const msvc = (): CompilerReport | undefined => {
      if (clPath) return { description: "cl.exe", libraryDirs: msvcLibraryDirsFromRoot(clPath) };
      const vswhere = this.vswherePath();
      if (!vswhere) return undefined;
      const root = this.visualStudioInstall()?.installationPath ?? dirname(vswhere);
      return {
        description: "Visual Studio toolchain (via vswhere)",
        hint:
          "cl.exe is not on PATH; use a Visual Studio generator or run from a " +
          "Developer Command Prompt for command-line builds.",
        libraryDirs: msvcLibraryDirsFromRoot(root),
      };
    };
    const mingw = (): CompilerReport | undefined =>
      gxxPath
        ? { description: `MinGW-w64 g++ at ${gxxPath}`, libraryDirs: compilerLibraryDirs(this.host, gxxPath) }
        : undefined;

    const order = preferred === "mingw" ? [mingw, msvc] : [msvc, mingw];
    for (const attempt of order) {
      const report = attempt();
      if (report) return report;
    }
    return { hint: MISSING_TOOLCHAIN_HINT, libraryDirs: [] };
  }

  // ─── Bundle ────────────────────────────────────────────────────────────────

  resolveEnvironment(cliGenerator?: string, cliQtPrefix?: string): ResolvedEnvironment {
    const generator = this.resolveGenerator(cliGenerator);
    return {
      generator,
      compiler: this.describeCompiler(generator),
      qtPrefix: this.resolveSdkPrefix(cliQtPrefix, generator),
    };
  }
}

/** Highest version; the first candidate wins ties. */
function pickHighest(candidates: SdkCandidate[]): SdkCandidate | undefined {
  let best: SdkCandidate | undefined;
  for (const candidate of candidates) {
    if (!best || compareVersionTuples(candidate.version, best.version) > 0) best = candidate;
  }
  return best;
}
