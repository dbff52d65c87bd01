import { describe, expect, it } from "vitest";
import { ConfigurationError } from "./errors";
import { mkWorld } from "./test/fixtures";
import { cloneWorld, countryNames, createWorld, getCountry, holding, toSnapshot, worldSignature, worldVocabulary } from "./world";

describe("world", () => {
  it("keeps countries in snapshot order and freezes them", () => {
    const world = mkWorld();
    expect(countryNames(world)).toEqual(["Atlantis", "Erewhon"]);
    expect(worldVocabulary(world)).toEqual(["Timber", "MetallicElements", "Housing"]);
    expect(Object.isFrozen(getCountry(world, "Atlantis"))).toBe(true);
    expect(() => getCountry(world, "Utopia")).toThrow('Country "Utopia" not found in world.');
  });

  it("reads population through the reserved resource name", () => {
    const atlantis = getCountry(mkWorld(), "Atlantis");
    expect(holding(atlantis, "Population")).toBe(100);
    expect(holding(atlantis, "Timber")).toBe(200);
    expect(holding(atlantis, "Gold")).toBe(0);
  });

  it("rejects unusable snapshots", () => {
    expect(() => createWorld({ countries: [{ name: "Atlantis", population: 0, resources: {} }] })).toThrow(ConfigurationError);
    expect(() => createWorld({ countries: [] })).toThrow(ConfigurationError);
  });

  it("clones without sharing structure and signs by content", () => {
    const world = mkWorld();
    const copy = cloneWorld(world);
    expect(copy).toEqual(world);
    expect(copy.countries.Atlantis).not.toBe(world.countries.Atlantis);
    expect(worldSignature(copy)).toBe(worldSignature(world));
    expect(worldSignature(world)).toBe(
      "Atlantis:100|Housing=0,MetallicElements=50,Timber=200;Erewhon:50|Housing=10,MetallicElements=100,Timber=20"
    );
  });

  it("round-trips through a snapshot", () => {
    const world = mkWorld();
    expect(createWorld(toSnapshot(world))).toEqual(world);
  });
});
