import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { loadTemplatesFile, parseSexps, parseTemplates } from "./templates";

const dataDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../data");

describe("parseSexps", () => {
  it("builds nested lists and drops comments", () => {
    const [form] = parseSexps("(A (b 1) ; note (ignored)\n c)");
    expect(form).toEqual({
      kind: "list",
      line: 1,
      items: [
        { kind: "atom", value: "A", line: 1 },
        {
          kind: "list",
          line: 1,
          items: [
            { kind: "atom", value: "b", line: 1 },
            { kind: "atom", value: "1", line: 1 }
          ]
        },
        { kind: "atom", value: "c", line: 2 }
      ]
    });
  });

  it("reports unbalanced parentheses", () => {
    expect(() => parseSexps("(TRANSFORM C (INPUTS", "t.tpl")).toThrow("t.tpl:1: missing ')'");
    expect(() => parseSexps("\n)", "t.tpl")).toThrow("t.tpl:2: unexpected ')'");
  });
});

describe("parseTemplates", () => {
  const text = [
    "; recipes",
    "(TRANSFORM C (INPUTS (Population 5) (Timber 5)) (OUTPUTS (Population 5) (Housing 1) (HousingWaste 1)))",
    "(TRANSFORM Smelter (INPUTS (MetallicElements 2)) (OUTPUTS (MetallicAlloysWaste 1) (MetallicAlloys 1))) ; trailing",
    "(NOTE not a template)"
  ].join("\n");

  it("names each template after its main product", () => {
    expect(parseTemplates(text)).toEqual([
      {
        name: "Housing",
        inputs: { Population: 5, Timber: 5 },
        outputs: { Population: 5, Housing: 1, HousingWaste: 1 }
      },
      {
        name: "MetallicAlloys",
        inputs: { MetallicElements: 2 },
        outputs: { MetallicAlloysWaste: 1, MetallicAlloys: 1 }
      }
    ]);
  });

  it("falls back to the label when every output is a by-product", () => {
    const [burn] = parseTemplates("(TRANSFORM Burn (INPUTS (Timber 1)) (OUTPUTS (TimberWaste 1)))");
    expect(burn.name).toBe("Burn");
  });

  it("reads keywords in any case", () => {
    const [chair] = parseTemplates("(transform C (inputs (Timber 1)) (outputs (Chair 1)))");
    expect(chair).toEqual({ name: "Chair", inputs: { Timber: 1 }, outputs: { Chair: 1 } });
  });

  it("lets a later template replace an earlier one of the same name in place", () => {
    const templates = parseTemplates(`${text}\n(TRANSFORM C (INPUTS (Timber 3)) (OUTPUTS (Housing 1)))`);
    expect(templates.map((t) => t.name)).toEqual(["Housing", "MetallicAlloys"]);
    expect(templates[0].inputs).toEqual({ Timber: 3 });
  });

  it("rejects malformed quantities and incomplete forms", () => {
    expect(() => parseTemplates("(TRANSFORM C (INPUTS (Timber 5)) (OUTPUTS (Housing x)))", "t.tpl")).toThrow(
      't.tpl:1: quantity for Housing must be a non-negative number, got "x"'
    );
    expect(() => parseTemplates("(TRANSFORM C (INPUTS (Timber -1)) (OUTPUTS (Housing 1)))", "t.tpl")).toThrow(
      "quantity for Timber must be a non-negative number"
    );
    expect(() => parseTemplates("(TRANSFORM C (OUTPUTS (Housing 1)))", "t.tpl")).toThrow(
      "t.tpl:1: TRANSFORM needs a label, INPUTS and OUTPUTS"
    );
  });

  it("loads the bundled recipes", async () => {
    const templates = await loadTemplatesFile(path.join(dataDir, "templates.tpl"));
    expect(templates.map((t) => t.name)).toEqual(["MetallicAlloys", "Electronics", "Housing"]);
  });
});
