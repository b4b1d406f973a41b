// src/fs-walk.ts — Deterministic recursive directory walk
// Sorted depth-first traversal with symlink cycle detection; used for SDK marker
// directories and the built-executable fallback search.

import { readdirSync, realpathSync, statSync } from "node:fs";
import { join, relative, sep } from "node:path";
import picomatch from "picomatch";
import type { Warning } from "./types.js";

export interface WalkEntry {
  path: string;
  /** Root-relative path with forward slashes, for glob matching. */
  relativePath: string;
  isDirectory: boolean;
}

/**
 * Visit every entry under `root` in sorted depth-first order. The visitor
 * returns true to stop the walk early.
 */
export function walkTree(
  root: string,
  visit: (entry: WalkEntry) => boolean | void,
  warnings: Warning[] = [],
): void {
  const visited = new Set<string>();
  try {
    visited.add(realpathSync(root));
  } catch {
    return;
  }
  walk(root, root, visit, visited, warnings);
}

function walk(
  dir: string,
  root: string,
  visit: (entry: WalkEntry) => boolean | void,
  visited: Set<string>,
  warnings: Warning[],
): boolean {
  let names: string[];
  try {
    names = readdirSync(dir).sort();
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({ level: "warn", module: "fs-walk", message: `Cannot read directory: ${msg}`, file: dir });
    return false;
  }

  for (const name of names) {
    const fullPath = join(dir, name);
    let isDirectory: boolean;
    try {
      isDirectory = statSync(fullPath).isDirectory();
    } catch {
      // Dangling symlink
      continue;
    }

    const entry: WalkEntry = {
      path: fullPath,
      relativePath: relative(root, fullPath).split(sep).join("/"),
      isDirectory,
    };
    if (visit(entry) === true) return true;

    if (isDirectory) {
      const real = realpathSync(fullPath);
      if (visited.has(real)) continue;
      visited.add(real);
      if (walk(fullPath, root, visit, visited, warnings)) return true;
    }
  }
  return false;
}

/** All directories under `root` whose relative path matches `pattern`. */
export function findDirectories(root: string, pattern: string, warnings: Warning[] = []): string[] {
  const isMatch = picomatch(pattern, { dot: true });
  const found: string[] = [];
  walkTree(
    root,
    (entry) => {
      if (entry.isDirectory && isMatch(entry.relativePath)) found.push(entry.path);
    },
    warnings,
  );
  return found;
}

/** First file named `name` under `root`, in walk order. */
export function findFirstFile(root: string, name: string, warnings: Warning[] = []): string | undefined {
  let found: string | undefined;
  walkTree(
    root,
    (entry) => {
      if (!entry.isDirectory && entry.relativePath.split("/").pop() === name) {
        found = entry.path;
        return true;
      }
      return false;
    },
    warnings,
  );
  return found;
}
