import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PlannerParams, type PlanReport, type ScheduleResult } from "@nationplan/shared";
import { formatSchedulesCsv, formatSummary, scheduleToRow, writeReport } from "./scheduleWriter";

const schedule: ScheduleResult = {
  actions: [
    { type: "transform", params: { country: "Atlantis", template: "Housing", scale: 2 } },
    { type: "transfer", params: { source: "Erewhon", destination: "Atlantis", bundle: { Housing: 1 } } }
  ],
  eu_trace: [0.5, 0.25],
  eu: 0.25
};

const report: PlanReport = {
  self: "Atlantis",
  params: PlannerParams.parse({ depth: 2 }),
  exhausted: false,
  expansions: 3,
  schedules: [schedule],
  final_world: [
    { name: "Atlantis", population: 100, resources: { Timber: 190, MetallicElements: 48, Housing: 3 } },
    { name: "Erewhon", population: 50, resources: { Timber: 20, MetallicElements: 100, Housing: 9 } }
  ]
};

describe("schedule rows", () => {
  it("joins actions with pipes and EUs with semicolons", () => {
    expect(scheduleToRow(schedule)).toEqual([
      "(TRANSFORM Atlantis Housing x2) | (TRANSFER Erewhon Atlantis (Housing 1))",
      "0.5000;0.2500"
    ]);
  });

  it("writes a header and one row per schedule", () => {
    const empty: ScheduleResult = { actions: [], eu_trace: [], eu: 0 };
    expect(formatSchedulesCsv([schedule, empty])).toBe(
      "Schedule,Step_EUs\n(TRANSFORM Atlantis Housing x2) | (TRANSFER Erewhon Atlantis (Housing 1)),0.5000;0.2500\n,\n"
    );
  });

  it("summarises schedules for the terminal", () => {
    expect(formatSummary(report)).toBe(
      [
        "Best schedules for Atlantis (3 expansions):",
        "#1 EU 0.2500",
        "  01. (TRANSFORM Atlantis Housing x2)  [0.5000]",
        "  02. (TRANSFER Erewhon Atlantis (Housing 1))  [0.2500]",
        "Atlantis after the best schedule: Population 100, Timber 190, MetallicElements 48, Housing 3",
        ""
      ].join("\n")
    );
    expect(
      formatSummary({ ...report, self: "Erewhon", exhausted: true, schedules: [{ actions: [], eu_trace: [], eu: 0 }] })
    ).toBe(
      "Best schedules for Erewhon (3 expansions, frontier exhausted):\n#1 EU 0.0000\n  (empty schedule)\n" +
        "Erewhon after the best schedule: Population 50, Timber 20, MetallicElements 100, Housing 9\n"
    );
  });
});

describe("writeReport", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "nationplan-writer-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes JSON for a .json target", async () => {
    const target = path.join(dir, "nested", "plan.json");
    await expect(writeReport(target, report)).resolves.toBe("json");
    expect(JSON.parse(await fs.readFile(target, "utf8"))).toEqual(report);
  });

  it("writes CSV for anything else", async () => {
    const target = path.join(dir, "plan.csv");
    await expect(writeReport(target, report)).resolves.toBe("csv");
    expect(await fs.readFile(target, "utf8")).toBe(formatSchedulesCsv(report.schedules));
  });
});
