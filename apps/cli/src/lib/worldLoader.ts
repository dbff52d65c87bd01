import fs from "node:fs/promises";
import { POPULATION, WeightEntry, WeightTable, WorldSnapshot } from "@nationplan/shared";
import { ConfigurationError } from "@nationplan/engine";
import { parseCsv, type CsvRow } from "./csv";

const COUNTRY_COLUMN = "country";

function readNumber(raw: string | undefined, column: string, source: string): number {
  const cell = (raw ?? "").trim();
  if (cell === "") {
    throw new ConfigurationError(`missing value for "${column}"`, source);
  }
  const value = Number(cell);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`"${cell}" is not a number (column "${column}")`, source);
  }
  return value;
}

function splitHeader(rows: CsvRow[], file: string): { header: string[]; body: CsvRow[] } {
  const [first, ...body] = rows;
  if (!first) {
    throw new ConfigurationError("file is empty", file);
  }
  return { header: first.cells.map((c) => c.trim()), body };
}

/**
 * Parses `Country,Population,<resource>...` rows. Every row must supply every
 * column; the columns after Population form the shared resource vocabulary.
 */
export function parseWorldCsv(text: string, file = "world"): WorldSnapshot {
  const { header, body } = splitHeader(parseCsv(text), file);
  if (header[0]?.toLowerCase() !== COUNTRY_COLUMN) {
    throw new ConfigurationError(`first column must be "Country", got "${header[0] ?? ""}"`, `${file}:1`);
  }
  const popIndex = header.findIndex((h) => h === POPULATION);
  if (popIndex < 0) {
    throw new ConfigurationError(`missing "${POPULATION}" column`, `${file}:1`);
  }
  const seenColumns = new Set<string>();
  for (const column of header) {
    if (column === "" || seenColumns.has(column)) {
      throw new ConfigurationError(`blank or duplicate column "${column}"`, `${file}:1`);
    }
    seenColumns.add(column);
  }

  const countries = body.map(({ line, cells }) => {
    const where = `${file}:${line}`;
    if (cells.length !== header.length) {
      throw new ConfigurationError(`expected ${header.length} cells, got ${cells.length}`, where);
    }
    const name = cells[0].trim();
    if (name === "") {
      throw new ConfigurationError("missing country name", where);
    }
    const resources: Record<string, number> = {};
    header.forEach((column, index) => {
      if (index === 0 || index === popIndex) return;
      resources[column] = readNumber(cells[index], column, where);
    });
    return { name, population: readNumber(cells[popIndex], POPULATION, where), resources };
  });

  const parsed = WorldSnapshot.safeParse({ countries });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const index = issue?.path[1];
    const row = typeof index === "number" ? body[index] : undefined;
    throw new ConfigurationError(
      `${issue?.path.slice(2).join(".") || "world"}: ${issue?.message ?? "invalid world"}`,
      row ? `${file}:${row.line}` : file
    );
  }
  return parsed.data;
}

/** Parses `resource,weight,baseline` rows (any column order) into a weight table. */
export function parseWeightsCsv(text: string, file = "weights"): WeightTable {
  const { header, body } = splitHeader(parseCsv(text), file);
  const lower = header.map((h) => h.toLowerCase());
  const columns = {
    resource: lower.indexOf("resource"),
    weight: lower.indexOf("weight"),
    baseline: lower.indexOf("baseline")
  };
  for (const [name, index] of Object.entries(columns)) {
    if (index < 0) throw new ConfigurationError(`missing "${name}" column`, `${file}:1`);
  }

  const table: WeightTable = {};
  for (const { line, cells } of body) {
    const where = `${file}:${line}`;
    const resource = (cells[columns.resource] ?? "").trim();
    if (resource === "") {
      throw new ConfigurationError("missing resource name", where);
    }
    if (Object.prototype.hasOwnProperty.call(table, resource)) {
      throw new ConfigurationError(`duplicate resource "${resource}"`, where);
    }
    const entry = WeightEntry.safeParse({
      resource,
      weight: readNumber(cells[columns.weight], "weight", where),
      baseline: readNumber(cells[columns.baseline], "baseline", where)
    });
    if (!entry.success) {
      throw new ConfigurationError(entry.error.issues.map((i) => i.message).join("; "), where);
    }
    table[resource] = { weight: entry.data.weight, baseline: entry.data.baseline };
  }

  const parsed = WeightTable.safeParse(table);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => i.message).join("; "), file);
  }
  return parsed.data;
}

export async function loadWorldFile(filePath: string): Promise<WorldSnapshot> {
  return parseWorldCsv(await fs.readFile(filePath, "utf8"), filePath);
}

export async function loadWeightsFile(filePath: string): Promise<WeightTable> {
  return parseWeightsCsv(await fs.readFile(filePath, "utf8"), filePath);
}
