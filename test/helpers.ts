import { vi } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { Host, RunOptions } from "../src/types.js";

export interface FakeHostOptions {
  platform?: NodeJS.Platform;
  env?: Record<string, string | undefined>;
  homeDir?: string;
  /** Command name → resolved path for `which`. */
  tools?: Record<string, string>;
  /** Space-joined argv → stdout for `capture`. */
  outputs?: Record<string, string>;
  /** Exit code for `run`; 0 when omitted. */
  exitCode?: (argv: string[]) => number;
}

export function makeHost(options: FakeHostOptions = {}) {
  const tools = options.tools ?? {};
  const outputs = options.outputs ?? {};
  const exitCode = options.exitCode ?? (() => 0);
  return {
    platform: options.platform ?? "linux",
    env: options.env ?? {},
    homeDir: options.homeDir ?? "/home/tester",
    which: vi.fn((command: string): string | undefined => tools[command]),
    capture: vi.fn((argv: string[], _options?: RunOptions): string | undefined => outputs[argv.join(" ")]),
    run: vi.fn((argv: string[], _options?: RunOptions): number => exitCode(argv)),
  } satisfies Host;
}

/** argv of every `run` call, in order. */
export function runCalls(host: ReturnType<typeof makeHost>): string[][] {
  return host.run.mock.calls.map((call) => call[0]);
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "cmake-devkit-test-"));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Create files (path → content) and directories (path ending in "/") under `root`. */
export function writeTree(root: string, entries: Record<string, string>): void {
  for (const [path, content] of Object.entries(entries)) {
    const fullPath = join(root, path);
    if (path.endsWith("/")) {
      mkdirSync(fullPath, { recursive: true });
      continue;
    }
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
}
