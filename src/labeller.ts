import { ConfigurationError } from "./errors.js";
import type { FacetValue } from "./util.js";

export type Labeller = (variable: string, value: FacetValue) => string;

export function formatValue(value: FacetValue): string {
  if (value === null) return "NA";
  return String(value);
}

export const labelValue: Labeller = (_variable, value) => formatValue(value);

export const labelBoth: Labeller = (variable, value) => `${variable}: ${formatValue(value)}`;

const named = new Map<string, Labeller>([
  ["label_value", labelValue],
  ["label_both", labelBoth],
]);

export const labellerNames = Array.from(named.keys());

export function resolveLabeller(labeller: unknown): Labeller {
  if (labeller === undefined || labeller === null) return labelValue;
  if (typeof labeller === "function") {
    const fn = labeller;
    return (variable, value) => String(fn(variable, value));
  }
  const hit = typeof labeller === "string" ? named.get(labeller) : undefined;
  if (!hit) {
    throw new ConfigurationError(
      `labeller must be a function or one of ${labellerNames.map((n) => `"${n}"`).join(", ")}; got ${JSON.stringify(labeller)}`,
    );
  }
  return hit;
}
