import { SearchPolicy, type Action, type SearchPolicyInput } from "@nationplan/shared";
import { validateAction } from "./apply";
import type { CountryName, PlanningContext, World } from "./state";
import { countryNames, getCountry, holding, worldVocabulary } from "./world";

/** Largest whole scale the country's holdings cover; 0 for a template with no inputs. */
function maxAffordableScale(world: World, countryName: CountryName, inputs: Readonly<Record<string, number>>): number {
  const country = getCountry(world, countryName);
  let max = Number.POSITIVE_INFINITY;
  for (const [resource, perUnit] of Object.entries(inputs)) {
    if (perUnit <= 0) continue;
    max = Math.min(max, Math.floor(holding(country, resource) / perUnit));
  }
  return Number.isFinite(max) ? max : 0;
}

/**
 * Lazily yields every legal action open to `self`, in a fixed order:
 *
 * 1. each template in context order, at scales 1, 2, ... up to the largest
 *    legal one (or the policy cap);
 * 2. for each partner in world order, one export per vocabulary resource
 *    (self -> partner) and, when imports are allowed, one import
 *    (partner -> self), each of `transfer_quantity` units.
 *
 * Every yielded action passes {@link validateAction}.
 */
export function* legalActions(
  world: World,
  self: CountryName,
  ctx: PlanningContext,
  policyInput: SearchPolicyInput = {}
): Generator<Action> {
  const policy = SearchPolicy.parse(policyInput);

  for (const template of ctx.templates) {
    const affordable = maxAffordableScale(world, self, template.inputs);
    const top = policy.max_transform_scale === undefined ? affordable : Math.min(affordable, policy.max_transform_scale);
    for (let scale = 1; scale <= top; scale++) {
      const action: Action = { type: "transform", params: { country: self, template: template.name, scale } };
      if (validateAction(world, action, ctx)) break;
      yield action;
    }
  }

  if (!policy.allow_transfers) return;

  const qty = policy.transfer_quantity;
  const vocabulary = worldVocabulary(world);
  const selfCountry = getCountry(world, self);
  for (const partnerName of countryNames(world)) {
    if (partnerName === self) continue;
    const partner = getCountry(world, partnerName);
    for (const resource of vocabulary) {
      if (holding(selfCountry, resource) >= qty) {
        yield { type: "transfer", params: { source: self, destination: partnerName, bundle: { [resource]: qty } } };
      }
    }
    if (!policy.allow_imports) continue;
    for (const resource of vocabulary) {
      if (holding(partner, resource) >= qty) {
        yield { type: "transfer", params: { source: partnerName, destination: self, bundle: { [resource]: qty } } };
      }
    }
  }
}
