import fs from "node:fs/promises";
import path from "node:path";
import { PlanReport, type ScheduleResult } from "@nationplan/shared";
import { describeAction } from "@nationplan/engine";
import { formatCsv } from "./csv";

export const SCHEDULE_CSV_HEADER = ["Schedule", "Step_EUs"] as const;

export function formatEu(value: number): string {
  return value.toFixed(4);
}

export function scheduleToRow(schedule: ScheduleResult): [string, string] {
  return [
    schedule.actions.map(describeAction).join(" | "),
    schedule.eu_trace.map(formatEu).join(";")
  ];
}

export function formatSchedulesCsv(schedules: ScheduleResult[]): string {
  return formatCsv([[...SCHEDULE_CSV_HEADER], ...schedules.map(scheduleToRow)]);
}

export function formatReportJson(report: PlanReport): string {
  return `${JSON.stringify(PlanReport.parse(report), null, 2)}\n`;
}

/** Human-readable listing of the schedules, best first, then self's holdings after the best one. */
export function formatSummary(report: PlanReport): string {
  const lines = [`Best schedules for ${report.self} (${report.expansions} expansions${report.exhausted ? ", frontier exhausted" : ""}):`];
  report.schedules.forEach((schedule, index) => {
    lines.push(`#${index + 1} EU ${formatEu(schedule.eu)}`);
    if (schedule.actions.length === 0) {
      lines.push("  (empty schedule)");
    }
    schedule.actions.forEach((action, step) => {
      lines.push(`  ${String(step + 1).padStart(2, "0")}. ${describeAction(action)}  [${formatEu(schedule.eu_trace[step] ?? 0)}]`);
    });
  });
  const self = report.final_world.find((country) => country.name === report.self);
  if (self) {
    const holdings = [`Population ${self.population}`, ...Object.entries(self.resources).map(([r, q]) => `${r} ${q}`)];
    lines.push(`${report.self} after the best schedule: ${holdings.join(", ")}`);
  }
  return `${lines.join("\n")}\n`;
}

/** Writes JSON when the target ends in `.json`, CSV otherwise. */
export async function writeReport(filePath: string, report: PlanReport): Promise<"json" | "csv"> {
  const format = path.extname(filePath).toLowerCase() === ".json" ? "json" : "csv";
  const body = format === "json" ? formatReportJson(report) : formatSchedulesCsv(report.schedules);
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, body, "utf8");
  return format;
}
