import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseTemplates } from "../lib/templates";
import { parseWeightsCsv, parseWorldCsv } from "../lib/worldLoader";

const defaultDataDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../data");

/** Picks a parser from the extension and, for CSV, the first header cell. */
function validateDataFile(file: string, text: string): string {
  if (file.endsWith(".tpl")) {
    return `${parseTemplates(text, file).length} templates`;
  }
  const firstCell = text.trimStart().split(/[,\r\n]/, 1)[0]?.trim().toLowerCase();
  if (firstCell === "country") {
    return `${parseWorldCsv(text, file).countries.length} countries`;
  }
  return `${Object.keys(parseWeightsCsv(text, file)).length} weights`;
}

async function main(): Promise<void> {
  const dataDir = process.argv[2] ? path.resolve(process.argv[2]) : defaultDataDir;
  const entries = await fs.readdir(dataDir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && (entry.name.endsWith(".csv") || entry.name.endsWith(".tpl")))
    .map((entry) => entry.name)
    .sort();

  if (files.length === 0) {
    console.error(`No data files found in ${dataDir}`);
    process.exit(1);
  }

  let hasErrors = false;

  for (const file of files) {
    try {
      const text = await fs.readFile(path.join(dataDir, file), "utf8");
      console.log(`Data OK: ${file} (${validateDataFile(file, text)})`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Data validation failed for ${file}: ${message}`);
      hasErrors = true;
    }
  }

  if (hasErrors) process.exit(1);
}

main().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Data validation error: ${message}`);
  process.exit(1);
});
