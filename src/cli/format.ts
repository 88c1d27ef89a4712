/**
 * Plain-text tables for plans, run results and stored status.
 */

import type { Plan, StepResult } from "../orchestration/types.js";
import type { StateRecord } from "../state/types.js";

/** Left-aligned columns, two spaces apart, with a header row. */
export function renderTable(headers: readonly string[], rows: readonly string[][]): string {
  const widths = headers.map((header, col) => Math.max(header.length, ...rows.map((row) => (row[col] ?? "").length)));
  const line = (cells: readonly string[]) =>
    cells
      .map((cell, col) => (col === cells.length - 1 ? cell : cell.padEnd(widths[col] ?? cell.length)))
      .join("  ")
      .trimEnd();
  return [line(headers), ...rows.map(line)].join("\n");
}

export function formatStatus(result: StepResult): string {
  return result.status === "skipped" && result.skipReason ? `skipped (${result.skipReason})` : result.status;
}

function detail(result: StepResult): string {
  if (result.error) return `${result.error.kind}: ${result.error.message}`;
  return "";
}

export function formatPlan(plan: Plan): string {
  const rows = plan.steps.map((step, index) => [
    String(index + 1),
    step.name,
    step.action,
    step.dependsOn.length > 0 ? step.dependsOn.join(", ") : "-",
  ]);
  return `Plan for ${plan.target} (${plan.steps.length} steps)\n${renderTable(["#", "STEP", "ACTION", "DEPENDS ON"], rows)}`;
}

export function formatResultTable(steps: readonly StepResult[]): string {
  const rows = steps.map((r) => [r.stepName, r.action, formatStatus(r), String(r.attempts), detail(r)]);
  return renderTable(["STEP", "ACTION", "STATUS", "ATTEMPTS", "DETAIL"], rows);
}

export function formatStatusTable(records: readonly StateRecord[]): string {
  const rows = records.map((record) => [
    record.step,
    record.result.action,
    formatStatus(record.result),
    record.updatedAt,
    detail(record.result),
  ]);
  return renderTable(["STEP", "ACTION", "STATUS", "UPDATED", "DETAIL"], rows);
}
