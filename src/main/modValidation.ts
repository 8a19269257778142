import semver from "semver";
import type { KnownLoader } from "./archive";
import { UNKNOWN_MOD_ID, type ModRecord } from "./modMetadata";

export type ModStatus =
  | { code: "ok" }
  | { code: "duplicate-mod-id" }
  | { code: "missing-dependency"; missing: string[] };

export type ModReport = {
  mod: ModRecord;
  status: ModStatus;
};

export type LoaderCount = { loader: KnownLoader; count: number };

export type DuplicateGroup = {
  id: string;
  // dominant-loader jars first, then newest version first
  mods: ModRecord[];
};

export type ModAnalysis = {
  loaderCounts: LoaderCount[];
  dominantLoader: KnownLoader | null;
  conflicts: ModRecord[];
  duplicates: DuplicateGroup[];
  reports: ModReport[];
};

export type AnalyzeOptions = {
  builtinProviders?: readonly string[];
};

export const DEFAULT_BUILTIN_PROVIDERS: readonly string[] = ["forge", "minecraft"];

export function countLoaders(mods: readonly ModRecord[]): LoaderCount[] {
  const counts = new Map<KnownLoader, number>();
  for (const m of mods) {
    if (m.type === "Unknown") continue;
    counts.set(m.type, (counts.get(m.type) ?? 0) + 1);
  }
  // Map keeps insertion order, so this is first-seen order.
  return [...counts.entries()].map(([loader, count]) => ({ loader, count }));
}

// Ties go to the loader seen first in the folder.
export function pickDominantLoader(counts: readonly LoaderCount[]): KnownLoader | null {
  let best: LoaderCount | null = null;
  for (const c of counts) {
    if (!best || c.count > best.count) best = c;
  }
  return best ? best.loader : null;
}

export function findConflicts(mods: readonly ModRecord[], dominant: KnownLoader | null): ModRecord[] {
  if (!dominant) return [];
  return mods.filter((m) => m.type !== dominant && m.type !== "Unknown");
}

export function findDuplicateIds(mods: readonly ModRecord[]): Set<string> {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const m of mods) {
    if (m.id === UNKNOWN_MOD_ID) continue;
    if (seen.has(m.id)) dupes.add(m.id);
    seen.add(m.id);
  }
  return dupes;
}

export function findMissingDependencies(
  mod: ModRecord,
  installedIds: ReadonlySet<string>,
  builtinProviders: readonly string[] = DEFAULT_BUILTIN_PROVIDERS
): string[] {
  return mod.requires.filter((dep) => !installedIds.has(dep) && !builtinProviders.includes(dep));
}

// Newer first; versions semver can't make sense of sort last, otherwise the
// scan order is kept.
export function compareModVersions(a: ModRecord, b: ModRecord): number {
  const va = semver.coerce(a.version);
  const vb = semver.coerce(b.version);
  if (va && vb) return semver.rcompare(va, vb);
  if (va) return -1;
  if (vb) return 1;
  return 0;
}

export function groupDuplicates(
  mods: readonly ModRecord[],
  duplicateIds: ReadonlySet<string>,
  dominant: KnownLoader | null = null
): DuplicateGroup[] {
  const loaderRank = (m: ModRecord) => (dominant && m.type === dominant ? 0 : 1);
  const byId = new Map<string, ModRecord[]>();
  for (const m of mods) {
    if (!duplicateIds.has(m.id)) continue;
    byId.set(m.id, [...(byId.get(m.id) || []), m]);
  }
  return [...byId.entries()].map(([id, list]) => ({
    id,
    mods: list.slice().sort((a, b) => loaderRank(a) - loaderRank(b) || compareModVersions(a, b))
  }));
}

export function statusLabel(status: ModStatus): string {
  switch (status.code) {
    case "ok":
      return "OK";
    case "duplicate-mod-id":
      return "Duplicate mod ID";
    case "missing-dependency":
      return `Install missing mods: ${status.missing.join(", ")}`;
  }
}

export function analyzeMods(mods: readonly ModRecord[], opts: AnalyzeOptions = {}): ModAnalysis {
  const builtinProviders = opts.builtinProviders ?? DEFAULT_BUILTIN_PROVIDERS;
  const loaderCounts = countLoaders(mods);
  const dominantLoader = pickDominantLoader(loaderCounts);
  const duplicateIds = findDuplicateIds(mods);
  // The fallback id never satisfies a dependency.
  const installedIds = new Set(mods.filter((m) => m.id !== UNKNOWN_MOD_ID).map((m) => m.id));

  const reports = mods.map((mod): ModReport => {
    if (duplicateIds.has(mod.id)) return { mod, status: { code: "duplicate-mod-id" } };
    const missing = findMissingDependencies(mod, installedIds, builtinProviders);
    if (missing.length) return { mod, status: { code: "missing-dependency", missing } };
    return { mod, status: { code: "ok" } };
  });

  return {
    loaderCounts,
    dominantLoader,
    conflicts: findConflicts(mods, dominantLoader),
    duplicates: groupDuplicates(mods, duplicateIds, dominantLoader),
    reports
  };
}
