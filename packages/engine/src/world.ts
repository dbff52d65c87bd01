import { POPULATION, WorldSnapshot } from "@nationplan/shared";
import { makeBundle, quantity } from "./bundle";
import { ConfigurationError } from "./errors";
import type { Country, CountryName, World } from "./state";

export function createWorld(snapshot: WorldSnapshot): World {
  const parsed = WorldSnapshot.safeParse(snapshot);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => i.message).join("; "), "world");
  }
  const countries: Record<CountryName, Country> = {};
  for (const c of parsed.data.countries) {
    countries[c.name] = Object.freeze({
      name: c.name,
      population: c.population,
      resources: makeBundle(c.resources)
    });
  }
  return Object.freeze({ countries: Object.freeze(countries) });
}

export function hasCountry(world: World, name: CountryName): boolean {
  return Object.prototype.hasOwnProperty.call(world.countries, name);
}

export function getCountry(world: World, name: CountryName): Country {
  if (!hasCountry(world, name)) {
    throw new Error(`Country "${name}" not found in world.`);
  }
  return world.countries[name];
}

export function countryNames(world: World): CountryName[] {
  return Object.keys(world.countries);
}

/** A country's holding of `resource`; `Population` reads the population. */
export function holding(country: Country, resource: string): number {
  return resource === POPULATION ? country.population : quantity(country.resources, resource);
}

/** Union of resource keys across countries, in first-seen order. */
export function worldVocabulary(world: World): string[] {
  const seen = new Set<string>();
  for (const country of Object.values(world.countries)) {
    for (const key of Object.keys(country.resources)) seen.add(key);
  }
  return [...seen];
}

/** Returns a world with the given countries replaced; the rest are shared. */
export function replaceCountries(world: World, changed: ReadonlyArray<Country>): World {
  const countries: Record<CountryName, Country> = { ...world.countries };
  for (const c of changed) {
    countries[c.name] = Object.freeze(c);
  }
  return Object.freeze({ countries: Object.freeze(countries) });
}

/** Deep copy with no structure shared with the input. */
export function cloneWorld(world: World): World {
  return structuredClone(world);
}

/** Stable identity of a world's holdings, used to spot duplicate states. */
export function worldSignature(world: World): string {
  return Object.keys(world.countries)
    .sort()
    .map((name) => {
      const c = world.countries[name];
      const res = Object.keys(c.resources)
        .sort()
        .map((r) => `${r}=${c.resources[r]}`)
        .join(",");
      return `${name}:${c.population}|${res}`;
    })
    .join(";");
}

export function toSnapshot(world: World): WorldSnapshot {
  return {
    countries: Object.values(world.countries).map((c) => ({
      name: c.name,
      population: c.population,
      resources: { ...c.resources }
    }))
  };
}
