// src/update-check.ts — Compare the local Qt with the newest upstream Qt 6 release
// Network failures degrade to "unavailable"; nothing here throws.

import type { EnvironmentProbe } from "./environment-probe.js";
import { HELP_URLS } from "./package-hints.js";
import {
  compareVersions,
  extractVersionsFromListing,
  formatVersionTuple,
  parseVersionFromPathSegments,
  selectLatest,
} from "./version.js";

export const QT_RELEASES_URL = "https://download.qt.io/official_releases/qt/";
const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchFn = (url: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

export interface FetchOptions {
  fetch?: FetchFn;
  timeoutMs?: number;
  baseUrl?: string;
}

export interface LatestVersion {
  version?: string;
  source: string;
  error?: string;
}

interface FetchResult {
  body?: string;
  error?: string;
}

async function fetchText(url: string, fetchImpl: FetchFn, timeoutMs: number): Promise<FetchResult> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetchImpl(url, { signal: controller.signal });
    if (!response.ok) return { error: `HTTP ${response.status} from ${url}` };
    return { body: await response.text() };
  } catch (err: unknown) {
    if (err instanceof Error && err.name === "AbortError") {
      return { error: `Request to ${url} timed out after ${timeoutMs / 1000}s` };
    }
    return { error: err instanceof Error ? err.message : String(err) };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Newest Qt 6 release: the newest 6.x directory of the release index, then
 * the newest 6.x.y inside it. Falls back to the 6.x name when the second
 * listing is unavailable.
 */
export async function fetchLatestQtVersion(options: FetchOptions = {}): Promise<LatestVersion> {
  const fetchImpl = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const baseUrl = options.baseUrl ?? QT_RELEASES_URL;

  const index = await fetchText(baseUrl, fetchImpl, timeoutMs);
  if (!index.body) return { source: baseUrl, error: index.error };

  const majorMinor = extractVersionsFromListing(index.body, 2).filter((v) => v.startsWith("6."));
  const newestMajorMinor = selectLatest(majorMinor);
  if (!newestMajorMinor) {
    return { source: baseUrl, error: "No Qt 6 versions found in the release index." };
  }

  const patchUrl = `${baseUrl}${newestMajorMinor}/`;
  const patches = await fetchText(patchUrl, fetchImpl, timeoutMs);
  if (patches.body) {
    const newestPatch = selectLatest(
      extractVersionsFromListing(patches.body, 3).filter((v) => v.startsWith(`${newestMajorMinor}.`)),
    );
    if (newestPatch) return { version: newestPatch, source: patchUrl };
  }

  return { version: newestMajorMinor, source: baseUrl, error: patches.error };
}

export interface UpdateReport {
  ok: boolean;
  lines: string[];
}

function statusLabel(comparison: number | undefined): string {
  if (comparison === undefined) return "";
  if (comparison < 0) return " (update available)";
  if (comparison === 0) return " (up to date)";
  return "";
}

/**
 * Local Qt (version read from the prefix path) against the newest release.
 * `ok` is false only when the upstream version could not be determined.
 */
export async function checkLibraryUpdates(
  probe: EnvironmentProbe,
  qtPrefix: string | undefined,
  options: FetchOptions = {},
): Promise<UpdateReport> {
  const lines = ["Checking library updates (Qt 6):"];

  const prefix = probe.resolveSdkPrefix(qtPrefix);
  const localVersion = prefix ? formatVersionTuple(parseVersionFromPathSegments(prefix)) : undefined;
  if (prefix) {
    lines.push(` - Qt local: ${localVersion ?? "unknown version"} at ${prefix}`);
  } else {
    lines.push(" - Qt local: not detected (set --qt-prefix / QT_PREFIX_PATH / CMAKE_PREFIX_PATH).");
  }

  const latest = await fetchLatestQtVersion(options);
  if (!latest.version) {
    lines.push(` - Qt latest: unavailable (${latest.error ?? "unknown error"})`);
    return { ok: false, lines };
  }

  const comparison = compareVersions(localVersion, latest.version);
  lines.push(` - Qt latest: ${latest.version} [${latest.source}]${statusLabel(comparison)}`);
  if (comparison !== undefined && comparison < 0) {
    lines.push(`   hint: run ${HELP_URLS.downloadCommand} --qt-version ${latest.version} to refresh ${probe.sdkRoot}.`);
  }
  return { ok: true, lines };
}
