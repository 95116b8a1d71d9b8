/**
 * Value normalizer: two projections of one PropertyValue.
 *
 * - display: a single line for on-screen panels (arrays space-joined)
 * - export:  structured output (arrays stay ordered lists of strings)
 */

import type { PropertyValue } from "./entity.js";

export type ExportValue = string | string[];

export interface NormalizedValue {
  display: string;
  exportValue: ExportValue;
}

export function assertNever(value: never): never {
  throw new Error(`unexpected value: ${JSON.stringify(value)}`);
}

export function displayValue(value: PropertyValue | undefined): string {
  if (value === undefined) return "";
  switch (value.kind) {
    case "absent":
      return "";
    case "scalar":
      return value.value;
    case "sequence":
      return value.items.join(" ");
    default:
      return assertNever(value);
  }
}

export function exportValue(value: PropertyValue | undefined): ExportValue {
  if (value === undefined) return "";
  switch (value.kind) {
    case "absent":
      return "";
    case "scalar":
      return value.value;
    case "sequence":
      return [...value.items];
    default:
      return assertNever(value);
  }
}

export function normalize(value: PropertyValue | undefined): NormalizedValue {
  return {
    display: displayValue(value),
    exportValue: exportValue(value),
  };
}

/** Text a value filter compares against. Arrays compare by their display form. */
export function matchText(value: PropertyValue | undefined): string {
  return displayValue(value);
}
