import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@nationplan/engine";
import { loadWeightsFile, loadWorldFile, parseWeightsCsv, parseWorldCsv } from "./worldLoader";

const dataDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../data");

describe("parseWorldCsv", () => {
  it("reads population and resources per country", () => {
    const world = parseWorldCsv("Country,Population,Timber,Housing\nAtlantis,100,200,0\nErewhon,50,20.5,10\n", "world.csv");
    expect(world.countries).toEqual([
      { name: "Atlantis", population: 100, resources: { Timber: 200, Housing: 0 } },
      { name: "Erewhon", population: 50, resources: { Timber: 20.5, Housing: 10 } }
    ]);
  });

  it("names file and line for an empty cell", () => {
    expect(() => parseWorldCsv("Country,Population,Timber\nAtlantis,100,\n", "world.csv")).toThrow(
      'world.csv:2: missing value for "Timber"'
    );
  });

  it("rejects non-numeric values and short rows", () => {
    expect(() => parseWorldCsv("Country,Population,Timber\nAtlantis,100,lots\n", "world.csv")).toThrow(
      'world.csv:2: "lots" is not a number (column "Timber")'
    );
    expect(() => parseWorldCsv("Country,Population,Timber\nAtlantis,100\n", "world.csv")).toThrow(
      "world.csv:2: expected 3 cells, got 2"
    );
  });

  it("rejects duplicate countries on the line of the repeat", () => {
    const text = "Country,Population,Timber\nAtlantis,100,1\nAtlantis,50,2\n";
    expect(() => parseWorldCsv(text, "world.csv")).toThrow('world.csv:3: name: duplicate country "Atlantis"');
  });

  it("requires a positive whole population", () => {
    expect(() => parseWorldCsv("Country,Population,Timber\nAtlantis,0,1\n", "world.csv")).toThrow(ConfigurationError);
    expect(() => parseWorldCsv("Country,Population,Timber\nAtlantis,2.5,1\n", "world.csv")).toThrow(
      "world.csv:2: population:"
    );
  });

  it("checks the header", () => {
    expect(() => parseWorldCsv("Country,Timber\nAtlantis,1\n", "world.csv")).toThrow('world.csv:1: missing "Population" column');
    expect(() => parseWorldCsv("Nation,Population\nAtlantis,1\n", "world.csv")).toThrow('first column must be "Country"');
    expect(() => parseWorldCsv("", "world.csv")).toThrow("world.csv: file is empty");
  });
});

describe("parseWeightsCsv", () => {
  it("reads rows in any column order and skips blank lines", () => {
    expect(parseWeightsCsv("resource,weight,baseline\nTimber,0.1,2\n\nHousing,2,0.2\n")).toEqual({
      Timber: { weight: 0.1, baseline: 2 },
      Housing: { weight: 2, baseline: 0.2 }
    });
    expect(parseWeightsCsv("weight,resource,baseline\n-0.5,Waste,0\n")).toEqual({ Waste: { weight: -0.5, baseline: 0 } });
  });

  it("rejects duplicates, bad numbers and an empty table", () => {
    expect(() => parseWeightsCsv("resource,weight,baseline\nTimber,1,1\nTimber,2,2\n", "weights.csv")).toThrow(
      'weights.csv:3: duplicate resource "Timber"'
    );
    expect(() => parseWeightsCsv("resource,weight,baseline\nTimber,x,1\n", "weights.csv")).toThrow(
      'weights.csv:2: "x" is not a number (column "weight")'
    );
    expect(() => parseWeightsCsv("resource,weight,baseline\n", "weights.csv")).toThrow(
      "weights.csv: weight table must not be empty"
    );
    expect(() => parseWeightsCsv("resource,weight\nTimber,1\n", "weights.csv")).toThrow('missing "baseline" column');
  });
});

describe("sample data", () => {
  it("loads the bundled world and weights", async () => {
    const world = await loadWorldFile(path.join(dataDir, "world.csv"));
    const weights = await loadWeightsFile(path.join(dataDir, "weights.csv"));
    expect(world.countries.map((c) => c.name)).toEqual(["Atlantis", "Brobdingnag", "Carpania", "Dinotopia", "Erewhon"]);
    expect(world.countries[0].population).toBe(100);
    expect(weights.Housing).toEqual({ weight: 2, baseline: 0.2 });
  });
});
