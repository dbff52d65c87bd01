import { POPULATION, type Action, type TransferAction, type TransformAction } from "@nationplan/shared";
import { addBundles, covers, makeBundle, quantity, scaleBundle, subtractBundles, type ResourceBundle } from "./bundle";
import { IllegalActionError } from "./errors";
import { err, ok, unwrap, type Result } from "./result";
import type { CountryName, PlanningContext, World } from "./state";
import { hasCountry, holding, replaceCountries } from "./world";

function withoutPopulation(bundle: ResourceBundle): ResourceBundle {
  const { [POPULATION]: _population, ...rest } = bundle;
  return makeBundle(rest);
}

function validateTransform(world: World, action: TransformAction, ctx: PlanningContext): IllegalActionError | null {
  const { country: name, template: templateName, scale } = action.params;
  if (!hasCountry(world, name)) {
    return new IllegalActionError("unknown_country", action, `no country named "${name}"`);
  }
  const template = ctx.templatesByName.get(templateName);
  if (!template) {
    return new IllegalActionError("unknown_template", action, `no template named "${templateName}"`);
  }
  if (!Number.isFinite(scale) || scale < 0) {
    return new IllegalActionError("invalid_scale", action, `scale must be a non-negative number, got ${scale}`);
  }
  const country = world.countries[name];
  const holdings = makeBundle({ ...country.resources, [POPULATION]: country.population });
  const required = scaleBundle(template.inputs, scale);
  if (!covers(holdings, required)) {
    const short = Object.keys(required)
      .filter((resource) => quantity(holdings, resource) < required[resource])
      .map((resource) => `${resource} ${quantity(holdings, resource)}/${required[resource]}`);
    return new IllegalActionError("insufficient_resources", action, `${name} is short of ${short.join(", ")}`);
  }
  const popAfter = country.population - (template.inputs[POPULATION] ?? 0) * scale + (template.outputs[POPULATION] ?? 0) * scale;
  if (!(popAfter > 0)) {
    return new IllegalActionError("population_exhausted", action, `${name} would be left with population ${popAfter}`);
  }
  return null;
}

function validateTransfer(world: World, action: TransferAction): IllegalActionError | null {
  const { source, destination, bundle } = action.params;
  for (const name of [source, destination]) {
    if (!hasCountry(world, name)) {
      return new IllegalActionError("unknown_country", action, `no country named "${name}"`);
    }
  }
  if (source === destination) {
    return new IllegalActionError("same_country", action, `${source} cannot transfer to itself`);
  }
  const from = world.countries[source];
  for (const [resource, amount] of Object.entries(bundle)) {
    if (resource === POPULATION) {
      return new IllegalActionError("population_not_transferable", action, `${POPULATION} cannot be transferred`);
    }
    if (!Number.isFinite(amount) || amount < 0) {
      return new IllegalActionError("invalid_quantity", action, `${resource} quantity must be non-negative, got ${amount}`);
    }
    const held = holding(from, resource);
    if (held < amount) {
      return new IllegalActionError("insufficient_resources", action, `${source} holds ${held} ${resource}, sends ${amount}`);
    }
  }
  return null;
}

/** The first violated precondition of `action` against `world`, or null when it is legal. */
export function validateAction(world: World, action: Action, ctx: PlanningContext): IllegalActionError | null {
  switch (action.type) {
    case "transform":
      return validateTransform(world, action, ctx);
    case "transfer":
      return validateTransfer(world, action);
  }
}

/**
 * Applies `action`, returning the successor world. The input world is never
 * touched; only the affected countries are rebuilt.
 */
export function tryApplyAction(world: World, action: Action, ctx: PlanningContext): Result<World, IllegalActionError> {
  const illegal = validateAction(world, action, ctx);
  if (illegal) return err(illegal);

  switch (action.type) {
    case "transform": {
      const { country: name, template: templateName, scale } = action.params;
      const country = world.countries[name];
      const template = ctx.templatesByName.get(templateName);
      if (!template) return err(new IllegalActionError("unknown_template", action, templateName));
      const inputs = scaleBundle(template.inputs, scale);
      const outputs = scaleBundle(template.outputs, scale);
      const population = country.population - (inputs[POPULATION] ?? 0) + (outputs[POPULATION] ?? 0);
      const resources = addBundles(
        subtractBundles(country.resources, withoutPopulation(inputs)),
        withoutPopulation(outputs)
      );
      return ok(replaceCountries(world, [{ name, population, resources }]));
    }

    case "transfer": {
      const { source, destination, bundle } = action.params;
      const from = world.countries[source];
      const to = world.countries[destination];
      return ok(
        replaceCountries(world, [
          { ...from, resources: subtractBundles(from.resources, bundle) },
          { ...to, resources: addBundles(to.resources, bundle) }
        ])
      );
    }
  }
}

/** Like {@link tryApplyAction} but throws the {@link IllegalActionError}. */
export function applyAction(world: World, action: Action, ctx: PlanningContext): World {
  return unwrap(tryApplyAction(world, action, ctx));
}

export function actionParticipants(action: Action): CountryName[] {
  switch (action.type) {
    case "transform":
      return [action.params.country];
    case "transfer":
      return [action.params.source, action.params.destination];
  }
}

export function describeAction(action: Action): string {
  switch (action.type) {
    case "transform": {
      const { country, template, scale } = action.params;
      return `(TRANSFORM ${country} ${template} x${scale})`;
    }
    case "transfer": {
      const { source, destination, bundle } = action.params;
      const items = Object.entries(bundle)
        .map(([resource, amount]) => `(${resource} ${amount})`)
        .join(" ");
      return `(TRANSFER ${source} ${destination} ${items})`;
    }
  }
}

/** Stable identity string; equal keys mean equal actions. */
export function actionKey(action: Action): string {
  switch (action.type) {
    case "transform": {
      const { country, template, scale } = action.params;
      return JSON.stringify(["transform", country, template, scale]);
    }
    case "transfer": {
      const { source, destination, bundle } = action.params;
      const items = Object.keys(bundle)
        .sort()
        .map((r) => [r, bundle[r]]);
      return JSON.stringify(["transfer", source, destination, items]);
    }
  }
}
