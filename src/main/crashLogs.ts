import fs, { type Dirent } from "node:fs";
import path from "node:path";

export const CAUSED_BY_PATTERN = /Caused by: ([\w.]+): (.+)/g;

export type CrashLogOptions = {
  limit?: number;
  extensions?: readonly string[];
};

function listLogFiles(dir: string, extensions: readonly string[]): string[] {
  const out: string[] = [];
  let entries: Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return out;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) out.push(...listLogFiles(full, extensions));
    else if (e.isFile() && extensions.includes(path.extname(e.name))) out.push(full);
  }
  return out;
}

export function findCausedByLines(text: string): string[] {
  return Array.from(text.matchAll(CAUSED_BY_PATTERN), (m) => m[0].trimEnd());
}

// null means there is no crash report folder at all.
export function scanCrashLogs(dir: string, opts: CrashLogOptions = {}): string[] | null {
  if (!fs.existsSync(dir)) return null;
  const limit = opts.limit ?? 5;
  const extensions = opts.extensions ?? [".log"];

  const lines: string[] = [];
  for (const file of listLogFiles(dir, extensions)) {
    let text: string;
    try {
      text = fs.readFileSync(file, "utf8");
    } catch {
      continue;
    }
    lines.push(...findCausedByLines(text));
  }
  return lines.slice(-limit);
}
