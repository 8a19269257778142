import fs from "node:fs";
import path from "node:path";
import { extractModInfo, type ExtractionResult } from "./modMetadata";

export function listModJars(modsDir: string): string[] {
  return fs
    .readdirSync(modsDir, { withFileTypes: true })
    .filter((d) => d.isFile() && d.name.endsWith(".jar"))
    .map((d) => d.name)
    .sort()
    .map((f) => path.join(modsDir, f));
}

// One archive is opened, read and released before the next.
export function scanModsFolder(modsDir: string): ExtractionResult[] {
  return listModJars(modsDir).map((jarPath) => extractModInfo(jarPath));
}
