import path from "node:path";
import { parse as parseToml } from "toml";
import { z } from "zod";
import { inspectArchive, readEntryText, type InspectedArchive, type KnownLoader, type LoaderType } from "./archive";
import { errorMessage } from "./errors";

export type ModRecord = Readonly<{
  file: string;
  id: string;
  name: string;
  version: string;
  type: LoaderType;
  requires: readonly string[];
}>;

// A degraded record still carries the file and detected loader, with every
// other field at its default.
export type ExtractionResult =
  | { status: "ok"; record: ModRecord }
  | { status: "degraded"; record: ModRecord; reason: string };

export const UNKNOWN_MOD_ID = "unknown";
export const UNKNOWN_VERSION = "?";

type ManifestFields = {
  id?: string;
  name?: string;
  version?: string;
  requires: string[];
};

const FabricManifestSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  version: z.string().optional(),
  depends: z.record(z.unknown()).optional()
});

const QuiltDependencySchema = z.union([z.string(), z.object({ id: z.string() }).passthrough()]);

// An any-of dependency is an array of alternatives.
const QuiltDependencyEntrySchema = z.union([QuiltDependencySchema, z.array(QuiltDependencySchema)]);

const QuiltManifestSchema = z.object({
  quilt_loader: z.object({
    id: z.string().optional(),
    version: z.string().optional(),
    metadata: z.object({ name: z.string().optional() }).passthrough().optional(),
    depends: z.array(z.unknown()).optional()
  })
});

const ForgeManifestSchema = z.object({
  mods: z
    .array(
      z
        .object({
          modId: z.string().optional(),
          displayName: z.string().optional(),
          version: z.string().optional()
        })
        .passthrough()
    )
    .min(1, "no [[mods]] entry"),
  dependencies: z.record(z.unknown()).optional()
});

const ForgeDependencySchema = z.object({ modId: z.string() }).passthrough();

function parseJson(text: string): unknown {
  return JSON.parse(text) as unknown;
}

export function readFabricManifest(raw: unknown): ManifestFields {
  const m = FabricManifestSchema.parse(raw);
  return {
    id: m.id,
    name: m.name,
    version: m.version,
    // version constraints are dropped, only the ids matter
    requires: Object.keys(m.depends ?? {})
  };
}

function quiltDependencyIds(entries: readonly unknown[]): string[] {
  const ids: string[] = [];
  for (const entry of entries) {
    const dep = QuiltDependencyEntrySchema.safeParse(entry);
    if (!dep.success) continue;
    for (const alt of Array.isArray(dep.data) ? dep.data : [dep.data]) {
      ids.push(typeof alt === "string" ? alt : alt.id);
    }
  }
  return ids;
}

export function readQuiltManifest(raw: unknown): ManifestFields {
  if (typeof raw !== "object" || raw === null || !("quilt_loader" in raw)) return readFabricManifest(raw);
  const loader = QuiltManifestSchema.parse(raw).quilt_loader;
  return {
    id: loader.id,
    name: loader.metadata?.name,
    version: loader.version,
    requires: quiltDependencyIds(loader.depends ?? [])
  };
}

export function readForgeManifest(raw: unknown): ManifestFields {
  const m = ForgeManifestSchema.parse(raw);
  const mod = m.mods[0];
  const declared = mod.modId ? m.dependencies?.[mod.modId] : undefined;
  const requires: string[] = [];
  if (Array.isArray(declared)) {
    for (const entry of declared) {
      const dep = ForgeDependencySchema.safeParse(entry);
      if (dep.success) requires.push(dep.data.modId);
    }
  }
  return {
    id: mod.modId,
    name: mod.displayName,
    version: mod.version,
    requires
  };
}

function readManifest(loader: KnownLoader, text: string): ManifestFields {
  switch (loader) {
    case "Fabric":
      return readFabricManifest(parseJson(text));
    case "Quilt":
      return readQuiltManifest(parseJson(text));
    case "Forge":
    case "NeoForge":
      return readForgeManifest(parseToml(text));
  }
}

export function toModRecord(file: string, type: LoaderType, fields?: ManifestFields): ModRecord {
  const id = fields?.id || UNKNOWN_MOD_ID;
  return Object.freeze({
    file,
    id,
    // name falls back to the manifest id before the file name
    name: fields?.name || fields?.id || file,
    version: fields?.version || UNKNOWN_VERSION,
    type,
    requires: Object.freeze([...(fields?.requires ?? [])])
  });
}

function degraded(file: string, type: LoaderType, reason: string): ExtractionResult {
  return { status: "degraded", record: toModRecord(file, type), reason };
}

export function extractModInfo(jarPath: string): ExtractionResult {
  const file = path.basename(jarPath);

  let archive: InspectedArchive;
  try {
    archive = inspectArchive(jarPath);
  } catch (err) {
    return degraded(file, "Unknown", `cannot open archive: ${errorMessage(err)}`);
  }

  if (archive.loader === "Unknown") {
    return degraded(file, "Unknown", "no loader manifest found");
  }

  try {
    const text = readEntryText(archive.zip, archive.manifestEntry);
    if (text === null) return degraded(file, archive.loader, `missing ${archive.manifestEntry}`);
    const fields = readManifest(archive.loader, text);
    return { status: "ok", record: toModRecord(file, archive.loader, fields) };
  } catch (err) {
    return degraded(file, archive.loader, `unreadable ${archive.manifestEntry}: ${errorMessage(err)}`);
  }
}
