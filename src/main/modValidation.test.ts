import { describe, expect, it } from "vitest";
import type { LoaderType } from "./archive";
import { toModRecord, type ModRecord } from "./modMetadata";
import {
  analyzeMods,
  compareModVersions,
  countLoaders,
  findMissingDependencies,
  pickDominantLoader,
  statusLabel
} from "./modValidation";

function mod(id: string, type: LoaderType, extra: { requires?: string[]; version?: string; file?: string } = {}): ModRecord {
  return toModRecord(extra.file ?? `${id}-${type}.jar`, type, {
    id,
    name: id,
    version: extra.version ?? "1.0.0",
    requires: extra.requires ?? []
  });
}

describe("analyzeMods", () => {
  it("picks the most common loader and flags the others", () => {
    const a1 = mod("a", "Forge");
    const a2 = mod("a", "Fabric");
    const b = mod("b", "Forge");
    const analysis = analyzeMods([a1, a2, b]);

    expect(analysis.dominantLoader).toBe("Forge");
    expect(analysis.loaderCounts).toEqual([
      { loader: "Forge", count: 2 },
      { loader: "Fabric", count: 1 }
    ]);
    expect(analysis.conflicts).toEqual([a2]);
    expect(analysis.reports.map((r) => statusLabel(r.status))).toEqual(["Duplicate mod ID", "Duplicate mod ID", "OK"]);
  });

  it("reports dependencies missing from the folder", () => {
    const analysis = analyzeMods([mod("needy", "Fabric", { requires: ["x", "minecraft", "forge", "y"] }), mod("y", "Fabric")]);
    expect(analysis.reports[0].status).toEqual({ code: "missing-dependency", missing: ["x"] });
    expect(statusLabel(analysis.reports[0].status)).toBe("Install missing mods: x");
    expect(analysis.reports[1].status).toEqual({ code: "ok" });
  });

  it("lets a duplicate id hide missing dependencies", () => {
    const analysis = analyzeMods([mod("d", "Forge", { requires: ["gone"] }), mod("d", "Forge")]);
    expect(analysis.reports[0].status).toEqual({ code: "duplicate-mod-id" });
  });

  it("never flags the fallback id as a duplicate", () => {
    const analysis = analyzeMods([
      toModRecord("one.jar", "Unknown"),
      toModRecord("two.jar", "Unknown"),
      toModRecord("three.jar", "Fabric")
    ]);
    expect(analysis.duplicates).toEqual([]);
    expect(analysis.reports.every((r) => r.status.code === "ok")).toBe(true);
  });

  it("does not let the fallback id satisfy a dependency", () => {
    const needy = toModRecord("needy.jar", "Fabric", { id: "needy", requires: ["unknown"] });
    const analysis = analyzeMods([needy, toModRecord("broken.jar", "Unknown")]);
    expect(analysis.reports[0].status).toEqual({ code: "missing-dependency", missing: ["unknown"] });
    expect(statusLabel(analysis.reports[0].status)).toBe("Install missing mods: unknown");
  });

  it("has no dominant loader and no conflicts when every mod is Unknown", () => {
    const analysis = analyzeMods([toModRecord("one.jar", "Unknown"), toModRecord("two.jar", "Unknown")]);
    expect(analysis.loaderCounts).toEqual([]);
    expect(analysis.dominantLoader).toBeNull();
    expect(analysis.conflicts).toEqual([]);
  });

  it("never selects Unknown jars as conflicts", () => {
    const unknown = toModRecord("mystery.jar", "Unknown");
    const analysis = analyzeMods([mod("a", "Quilt"), unknown, mod("b", "Quilt"), mod("c", "NeoForge")]);
    expect(analysis.dominantLoader).toBe("Quilt");
    expect(analysis.conflicts.map((m) => m.file)).toEqual(["c-NeoForge.jar"]);
  });

  it("honours custom built-in providers", () => {
    const needy = mod("needy", "Fabric", { requires: ["fabricloader", "java", "minecraft"] });
    const analysis = analyzeMods([needy], { builtinProviders: ["fabricloader", "java"] });
    expect(analysis.reports[0].status).toEqual({ code: "missing-dependency", missing: ["minecraft"] });
  });

  it("groups duplicates newest version first", () => {
    const old = mod("dup", "Fabric", { version: "1.2.0", file: "dup-old.jar" });
    const fresh = mod("dup", "Fabric", { version: "1.10.0", file: "dup-new.jar" });
    const analysis = analyzeMods([old, mod("other", "Fabric"), fresh]);
    expect(analysis.duplicates).toEqual([{ id: "dup", mods: [fresh, old] }]);
  });

  it("puts dominant-loader jars ahead of newer jars from other loaders", () => {
    const fabricCopy = mod("shared", "Fabric", { version: "3.0.0", file: "shared-fabric.jar" });
    const forgeCopy = mod("shared", "Forge", { version: "1.0.0", file: "shared-forge.jar" });
    const analysis = analyzeMods([fabricCopy, forgeCopy, mod("other", "Forge")]);
    expect(analysis.dominantLoader).toBe("Forge");
    expect(analysis.duplicates).toEqual([{ id: "shared", mods: [forgeCopy, fabricCopy] }]);
  });
});

describe("pickDominantLoader", () => {
  it("breaks ties in favour of the loader seen first", () => {
    const counts = countLoaders([mod("a", "Fabric"), mod("b", "Forge"), mod("c", "Forge"), mod("d", "Fabric")]);
    expect(pickDominantLoader(counts)).toBe("Fabric");
  });

  it("returns null without counts", () => {
    expect(pickDominantLoader([])).toBeNull();
  });
});

describe("findMissingDependencies", () => {
  it("keeps declaration order", () => {
    const m = mod("m", "Forge", { requires: ["zeta", "alpha", "forge"] });
    expect(findMissingDependencies(m, new Set(["m"]))).toEqual(["zeta", "alpha"]);
  });
});

describe("compareModVersions", () => {
  it("orders parsable versions before unparsable ones", () => {
    const unparsable = mod("v", "Fabric", { version: "?" });
    const parsed = mod("v", "Fabric", { version: "2.0" });
    expect([unparsable, parsed].sort(compareModVersions)).toEqual([parsed, unparsable]);
    expect(compareModVersions(unparsable, mod("v", "Fabric", { version: "?" }))).toBe(0);
  });
});
