/**
 * Resource bundles: frozen resource -> quantity maps. Missing keys read as
 * zero, and arithmetic keeps every key present in either operand.
 */
export type ResourceBundle = Readonly<Record<string, number>>;

export function makeBundle(amounts: Record<string, number>): ResourceBundle {
  return Object.freeze({ ...amounts });
}

export function quantity(bundle: ResourceBundle, resource: string): number {
  return Object.prototype.hasOwnProperty.call(bundle, resource) ? bundle[resource] : 0;
}

function combine(a: ResourceBundle, b: ResourceBundle, sign: 1 | -1): ResourceBundle {
  const out: Record<string, number> = { ...a };
  for (const [resource, amount] of Object.entries(b)) {
    out[resource] = quantity(a, resource) + sign * amount;
  }
  return Object.freeze(out);
}

export function addBundles(a: ResourceBundle, b: ResourceBundle): ResourceBundle {
  return combine(a, b, 1);
}

export function subtractBundles(a: ResourceBundle, b: ResourceBundle): ResourceBundle {
  return combine(a, b, -1);
}

export function scaleBundle(bundle: ResourceBundle, factor: number): ResourceBundle {
  const out: Record<string, number> = {};
  for (const [resource, amount] of Object.entries(bundle)) {
    out[resource] = amount * factor;
  }
  return Object.freeze(out);
}

/** True when `holdings` has at least every quantity listed in `required`. */
export function covers(holdings: ResourceBundle, required: ResourceBundle): boolean {
  return Object.entries(required).every(([resource, amount]) => quantity(holdings, resource) >= amount);
}

/** Equality under the missing-is-zero rule. */
export function bundlesEqual(a: ResourceBundle, b: ResourceBundle): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const key of keys) {
    if (quantity(a, key) !== quantity(b, key)) return false;
  }
  return true;
}
