import fs from "node:fs";

// Returns null when the file doesn't exist; a file that exists but isn't JSON
// is an error for the caller to report.
export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return null;
  const raw = fs.readFileSync(filePath, "utf8");
  return JSON.parse(raw) as unknown;
}
