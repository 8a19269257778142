import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "./errors";
import type { DuplicateGroup } from "./modValidation";

export type DeletionResult =
  | { file: string; deleted: true }
  | { file: string; deleted: false; error: string };

export type RemoveFn = (filePath: string) => void;

const removeFile: RemoveFn = (filePath) => fs.rmSync(filePath);

// Deletes one file at a time; a failure is recorded and the rest still go.
export function deleteMods(modsDir: string, files: readonly string[], remove: RemoveFn = removeFile): DeletionResult[] {
  const results: DeletionResult[] = [];
  for (const file of files) {
    try {
      remove(path.join(modsDir, file));
      results.push({ file, deleted: true });
    } catch (err) {
      results.push({ file, deleted: false, error: errorMessage(err) });
    }
  }
  return results;
}

// Keeps the newest jar of every duplicated id and lists the rest.
export function planDuplicatePrune(duplicates: readonly DuplicateGroup[], skip: ReadonlySet<string> = new Set()): string[] {
  const out: string[] = [];
  for (const group of duplicates) {
    const remaining = group.mods.filter((m) => !skip.has(m.file));
    for (const loser of remaining.slice(1)) out.push(loser.file);
  }
  return out;
}
