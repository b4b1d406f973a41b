// src/host.ts — Process host: platform, environment, PATH lookup, subprocesses
// Everything the probes read from the machine goes through a Host so tests can swap it.

import { spawnSync } from "node:child_process";
import { accessSync, constants, statSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join } from "node:path";
import type { Host, RunOptions } from "./types.js";

/** PATH list separator for the given platform (not the one we happen to run on). */
export function pathListDelimiter(platform: NodeJS.Platform): string {
  return platform === "win32" ? ";" : ":";
}

function isExecutableFile(path: string, platform: NodeJS.Platform): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    if (platform !== "win32") accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Look a command up on PATH the way a shell would. On Windows each PATHEXT
 * extension is tried after the bare name.
 */
export function findOnPath(
  command: string,
  env: Record<string, string | undefined>,
  platform: NodeJS.Platform,
): string | undefined {
  const extensions = platform === "win32"
    ? ["", ...(env.PATHEXT ?? ".COM;.EXE;.BAT;.CMD").split(";").filter(Boolean).map((e) => e.toLowerCase())]
    : [""];

  if (isAbsolute(command) || command.includes("/") || command.includes("\\")) {
    for (const ext of extensions) {
      if (isExecutableFile(command + ext, platform)) return command + ext;
    }
    return undefined;
  }

  const searchPath = env.PATH ?? env.Path ?? "";
  for (const dir of searchPath.split(pathListDelimiter(platform))) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = join(dir, command + ext);
      if (isExecutableFile(candidate, platform)) return candidate;
    }
  }
  return undefined;
}

/** Host backed by the running Node.js process. */
export function createNodeHost(): Host {
  const env = process.env;
  const platform = process.platform;

  return {
    platform,
    env,
    homeDir: homedir(),
    which: (command) => findOnPath(command, env, platform),
    capture(argv: string[], options: RunOptions = {}) {
      const [file, ...args] = argv;
      const result = spawnSync(file, args, {
        cwd: options.cwd,
        encoding: "utf-8",
        timeout: 30_000,
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      });
      if (result.error || result.status !== 0) return undefined;
      return result.stdout;
    },
    run(argv: string[], options: RunOptions = {}) {
      const [file, ...args] = argv;
      const result = spawnSync(file, args, { cwd: options.cwd, stdio: "inherit" });
      if (result.error) return 127;
      return result.status ?? 1;
    },
  };
}
