export type CsvRow = {
  /** 1-based line the row starts on. */
  line: number;
  cells: string[];
};

/**
 * Splits CSV text into rows of raw cells. Handles quoted cells with embedded
 * commas, doubled quotes and newlines; blank lines are skipped.
 */
export function parseCsv(text: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let cells: string[] = [];
  let cell = "";
  let quoted = false;
  let line = 1;
  let rowLine = 1;
  let rowHasContent = false;

  const endCell = () => {
    cells.push(cell);
    cell = "";
  };
  const endRow = () => {
    endCell();
    if (rowHasContent) rows.push({ line: rowLine, cells });
    cells = [];
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        if (ch === "\n") line++;
        cell += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
      rowHasContent = true;
    } else if (ch === ",") {
      endCell();
      rowHasContent = true;
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      endRow();
      line++;
      rowLine = line;
    } else {
      cell += ch;
      if (ch.trim() !== "") rowHasContent = true;
    }
  }
  if (quoted) {
    throw new Error(`unterminated quoted cell starting on line ${rowLine}`);
  }
  endRow();
  return rows;
}

/** Quotes a cell when it holds a comma, quote or line break. */
export function formatCsvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(rows: ReadonlyArray<ReadonlyArray<string>>): string {
  return rows.map((row) => row.map(formatCsvCell).join(",")).join("\n") + "\n";
}
