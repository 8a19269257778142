import AdmZip from "adm-zip";

export type LoaderType = "Fabric" | "Quilt" | "Forge" | "NeoForge" | "Unknown";

export type KnownLoader = Exclude<LoaderType, "Unknown">;

// Checked in this order; the first marker found decides the loader.
export const LOADER_MARKERS: ReadonlyArray<{ loader: KnownLoader; marker: string }> = [
  { loader: "Fabric", marker: "fabric.mod.json" },
  { loader: "Quilt", marker: "quilt.mod.json" },
  { loader: "Forge", marker: "META-INF/mods.toml" },
  { loader: "NeoForge", marker: "META-INF/neoforge.mods.toml" }
];

export type LoaderDetection =
  | { loader: KnownLoader; manifestEntry: string }
  | { loader: "Unknown"; manifestEntry: null };

export type InspectedArchive = LoaderDetection & {
  zip: AdmZip;
  entryNames: string[];
};

export function detectLoader(entryNames: readonly string[]): LoaderDetection {
  for (const { loader, marker } of LOADER_MARKERS) {
    const hit = entryNames.find((name) => name.includes(marker));
    // a root manifest wins over any other entry carrying the marker name
    if (hit) return { loader, manifestEntry: entryNames.includes(marker) ? marker : hit };
  }
  return { loader: "Unknown", manifestEntry: null };
}

// Throws when the file is not a readable zip archive.
export function inspectArchive(jarPath: string): InspectedArchive {
  const zip = new AdmZip(jarPath);
  const entryNames = zip
    .getEntries()
    .filter((e) => !e.isDirectory)
    .map((e) => e.entryName);
  return { ...detectLoader(entryNames), zip, entryNames };
}

export function readEntryText(zip: AdmZip, name: string): string | null {
  const e = zip.getEntry(name);
  if (!e) return null;
  return zip.readAsText(e);
}
