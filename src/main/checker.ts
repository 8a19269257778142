import { deleteMods, planDuplicatePrune, type DeletionResult, type RemoveFn } from "./cleanup";
import type { CheckerConfig } from "./config";
import { scanCrashLogs } from "./crashLogs";
import { ModsFolderNotFoundError } from "./errors";
import type { ConfirmFn, Logger } from "./logging";
import type { ModRecord } from "./modMetadata";
import { analyzeMods, type ModAnalysis } from "./modValidation";
import { getCrashReportsDir, isDirectory } from "./paths";
import { renderModTable } from "./report";
import { scanModsFolder } from "./scanner";

// One check of a mods folder:
// - Extracts a record from every jar (broken jars degrade, they never abort the run).
// - Works out the dominant loader and offers to delete jars built for other loaders.
// - Optionally prunes older copies of duplicated mod ids.
// - Prints the per-mod status table and the latest crash report causes.

export type CheckOptions = {
  modsDir: string;
  config: CheckerConfig;
  // skip the confirmation prompts
  assumeYes?: boolean;
  pruneDuplicates?: boolean;
};

export type CheckDeps = {
  log: Logger;
  confirm: ConfirmFn;
  remove?: RemoveFn;
};

export type CheckOutcome =
  | { status: "no-mods" }
  | {
      status: "complete";
      mods: ModRecord[];
      analysis: ModAnalysis;
      deleted: DeletionResult[];
      crashLines: string[] | null;
    };

async function confirmAndDelete(
  question: string,
  files: readonly string[],
  opts: CheckOptions,
  deps: CheckDeps
): Promise<DeletionResult[] | null> {
  const confirmed = opts.assumeYes || (await deps.confirm(question));
  if (!confirmed) {
    deps.log.success("Skipping deletion.");
    return null;
  }

  const results = deleteMods(opts.modsDir, files, deps.remove);
  for (const r of results) {
    if (r.deleted) deps.log.info(`- Deleted: ${r.file}`);
    else deps.log.error(`Failed to delete ${r.file}: ${r.error}`);
  }
  return results;
}

export async function runModCheck(opts: CheckOptions, deps: CheckDeps): Promise<CheckOutcome> {
  const { log } = deps;
  if (!isDirectory(opts.modsDir)) throw new ModsFolderNotFoundError(opts.modsDir);

  const scanned = scanModsFolder(opts.modsDir);
  for (const s of scanned) {
    if (s.status === "degraded") log.debug(`${s.record.file}: ${s.reason}`);
  }
  const mods = scanned.map((s) => s.record);

  if (!mods.length) {
    log.error("No mods found in this folder.");
    return { status: "no-mods" };
  }

  const analysis = analyzeMods(mods, { builtinProviders: opts.config.builtinProviders });
  const deleted: DeletionResult[] = [];

  if (analysis.dominantLoader) {
    log.info(`Dominant loader detected: ${analysis.dominantLoader}`);
  } else {
    log.warn("No dominant loader could be determined; skipping loader conflict check.");
  }

  if (analysis.conflicts.length) {
    log.warn(`Found ${analysis.conflicts.length} mods from other loaders.`);
    const results = await confirmAndDelete(
      "Delete conflicting mods?",
      analysis.conflicts.map((m) => m.file),
      opts,
      deps
    );
    if (results) deleted.push(...results);
  } else if (analysis.dominantLoader) {
    log.success("All mods match the same loader type!");
  }

  if (opts.pruneDuplicates) {
    const gone = new Set(deleted.filter((r) => r.deleted).map((r) => r.file));
    const prune = planDuplicatePrune(analysis.duplicates, gone);
    if (prune.length) {
      log.warn(`Found ${prune.length} older duplicate mods.`);
      const results = await confirmAndDelete("Delete older duplicate mods?", prune, opts, deps);
      if (results) deleted.push(...results);
    }
  }

  for (const line of renderModTable(analysis.reports)) log.info(line);

  const crashDir = opts.config.crashReportsDir ?? getCrashReportsDir(opts.modsDir);
  const crashLines = scanCrashLogs(crashDir, {
    limit: opts.config.crashLogLimit,
    extensions: opts.config.crashLogExtensions
  });
  if (crashLines?.length) {
    log.error("Recent Crash Log Entries:");
    for (const line of crashLines) log.info(`• ${line}`);
  }

  log.success("Scan complete!");
  return { status: "complete", mods, analysis, deleted, crashLines };
}
