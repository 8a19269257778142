import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import AdmZip from "adm-zip";
import type { LogSink } from "../main/logging";

export function makeTempDir(prefix = "mod-checker-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeJar(dir: string, file: string, entries: Record<string, string>): string {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, Buffer.from(content, "utf8"));
  }
  const target = path.join(dir, file);
  zip.writeZip(target);
  return target;
}

export function fabricJson(fields: {
  id?: string;
  name?: string;
  version?: string;
  depends?: Record<string, string>;
}): string {
  return JSON.stringify({ schemaVersion: 1, environment: "*", ...fields }, null, 2);
}

export function fabricJar(dir: string, file: string, id: string, depends: Record<string, string> = {}): string {
  return writeJar(dir, file, {
    "fabric.mod.json": fabricJson({ id, name: id, version: "1.0.0", depends })
  });
}

type TomlDependency = { modId?: string; mandatory?: boolean; versionRange?: string };

export function modsToml(mod: {
  modId?: string;
  displayName?: string;
  version?: string;
  dependencies?: Record<string, TomlDependency[]>;
}): string {
  const lines = ['modLoader="javafml"', 'loaderVersion="[47,)"', 'license="MIT"', "", "[[mods]]"];
  if (mod.modId !== undefined) lines.push(`modId="${mod.modId}"`);
  if (mod.version !== undefined) lines.push(`version="${mod.version}"`);
  if (mod.displayName !== undefined) lines.push(`displayName="${mod.displayName}"`);
  for (const [owner, deps] of Object.entries(mod.dependencies ?? {})) {
    for (const dep of deps) {
      lines.push("", `[[dependencies.${owner}]]`);
      if (dep.modId !== undefined) lines.push(`modId="${dep.modId}"`);
      lines.push(`mandatory=${dep.mandatory ?? true}`);
      lines.push(`versionRange="${dep.versionRange ?? "*"}"`);
    }
  }
  return lines.join("\n") + "\n";
}

export function forgeJar(dir: string, file: string, modId: string, deps: string[] = []): string {
  return writeJar(dir, file, {
    "META-INF/mods.toml": modsToml({
      modId,
      displayName: modId,
      version: "1.0.0",
      dependencies: { [modId]: deps.map((d) => ({ modId: d })) }
    })
  });
}

export type CapturedLog = {
  sink: LogSink;
  // stdout and stderr interleaved, in write order
  lines: string[];
  out: string[];
  err: string[];
};

export function captureSink(): CapturedLog {
  const captured: CapturedLog = {
    lines: [],
    out: [],
    err: [],
    sink: {
      out: (line) => {
        captured.out.push(line);
        captured.lines.push(line);
      },
      err: (line) => {
        captured.err.push(line);
        captured.lines.push(line);
      }
    }
  };
  return captured;
}
