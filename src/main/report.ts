import { statusLabel, type ModReport, type ModStatus } from "./modValidation";

export const MOD_TABLE_HEADERS = ["Mod Name", "Type", "Version", "Status"] as const;

export function renderTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): string[] {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
  const line = (cells: readonly string[]) =>
    widths
      .map((w, i) => (cells[i] ?? "").padEnd(w))
      .join("  ")
      .trimEnd();
  return [line(headers), widths.map((w) => "─".repeat(w)).join("  "), ...rows.map(line)];
}

export function formatStatus(status: ModStatus): string {
  const label = statusLabel(status);
  return status.code === "ok" ? label : `⚠ ${label}`;
}

export function renderModTable(reports: readonly ModReport[]): string[] {
  return renderTable(
    MOD_TABLE_HEADERS,
    reports.map((r) => [r.mod.name, r.mod.type, r.mod.version, formatStatus(r.status)])
  );
}
