import fs from "node:fs/promises";
import { POPULATION, TransformTemplate } from "@nationplan/shared";
import { ConfigurationError } from "@nationplan/engine";

type Token = { text: string; line: number };

export type Sexp =
  | { kind: "atom"; value: string; line: number }
  | { kind: "list"; items: Sexp[]; line: number };

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  text.split(/\r?\n/).forEach((raw, index) => {
    const line = index + 1;
    const code = raw.split(";", 1)[0] ?? "";
    for (const match of code.matchAll(/[()]|[^\s()]+/g)) {
      tokens.push({ text: match[0], line });
    }
  });
  return tokens;
}

/** Reads every top-level form of a parenthesized document. */
export function parseSexps(text: string, file = "templates"): Sexp[] {
  const tokens = tokenize(text);
  let pos = 0;

  const readForm = (): Sexp => {
    const token = tokens[pos];
    if (token === undefined) {
      throw new ConfigurationError("unexpected end of input", file);
    }
    pos++;
    if (token.text === ")") {
      throw new ConfigurationError("unexpected ')'", `${file}:${token.line}`);
    }
    if (token.text !== "(") {
      return { kind: "atom", value: token.text, line: token.line };
    }
    const items: Sexp[] = [];
    while (tokens[pos]?.text !== ")") {
      if (pos >= tokens.length) {
        throw new ConfigurationError("missing ')'", `${file}:${token.line}`);
      }
      items.push(readForm());
    }
    pos++;
    return { kind: "list", items, line: token.line };
  };

  const forms: Sexp[] = [];
  while (pos < tokens.length) forms.push(readForm());
  return forms;
}

function headOf(form: Sexp): string | null {
  if (form.kind !== "list") return null;
  const head = form.items[0];
  return head?.kind === "atom" ? head.value.toUpperCase() : null;
}

function readSection(section: Sexp, file: string): Record<string, number> {
  const amounts: Record<string, number> = {};
  if (section.kind !== "list") return amounts;
  for (const entry of section.items.slice(1)) {
    const where = `${file}:${entry.line}`;
    if (entry.kind !== "list" || entry.items.length !== 2) {
      throw new ConfigurationError("expected a (Resource quantity) pair", where);
    }
    const [resource, qty] = entry.items;
    if (resource?.kind !== "atom" || qty?.kind !== "atom") {
      throw new ConfigurationError("expected a (Resource quantity) pair", where);
    }
    const value = Number(qty.value);
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigurationError(`quantity for ${resource.value} must be a non-negative number, got "${qty.value}"`, where);
    }
    amounts[resource.value] = value;
  }
  return amounts;
}

/**
 * Name of a template: its first output other than Population or a *Waste
 * by-product, else the atom after TRANSFORM.
 */
export function templateName(outputs: Record<string, number>, label: string | undefined): string {
  const product = Object.keys(outputs).find((r) => r !== POPULATION && !r.endsWith("Waste"));
  return product ?? label ?? Object.keys(outputs)[0] ?? "TRANSFORM";
}

/**
 * Parses `(TRANSFORM C (INPUTS ...) (OUTPUTS ...))` forms; other forms are
 * ignored. A later template with an already-seen name replaces the earlier
 * one and keeps its position.
 */
export function parseTemplates(text: string, file = "templates"): TransformTemplate[] {
  const byName = new Map<string, TransformTemplate>();

  for (const form of parseSexps(text, file)) {
    if (form.kind !== "list" || headOf(form) !== "TRANSFORM") continue;
    const where = `${file}:${form.line}`;
    const label = form.items[1];
    if (form.items.length < 4) {
      throw new ConfigurationError("TRANSFORM needs a label, INPUTS and OUTPUTS", where);
    }

    let inputs: Record<string, number> = {};
    let outputs: Record<string, number> = {};
    for (const section of form.items.slice(2)) {
      const head = headOf(section);
      if (head === "INPUTS") inputs = { ...inputs, ...readSection(section, file) };
      else if (head === "OUTPUTS") outputs = { ...outputs, ...readSection(section, file) };
    }

    const name = templateName(outputs, label?.kind === "atom" ? label.value : undefined);
    const parsed = TransformTemplate.safeParse({ name, inputs, outputs });
    if (!parsed.success) {
      throw new ConfigurationError(parsed.error.issues.map((i) => i.message).join("; "), where);
    }
    byName.set(name, parsed.data);
  }

  return [...byName.values()];
}

export async function loadTemplatesFile(filePath: string): Promise<TransformTemplate[]> {
  return parseTemplates(await fs.readFile(filePath, "utf8"), filePath);
}
