/**
 * JSON and YAML writers for trees whose mappings are `Map`s.
 *
 * Property keys come from entity data: they may be integer-like (an
 * unresolved key hash) or `__proto__`. A plain object would move the first
 * kind ahead of the others and drop the second, so mappings stay `Map`s up
 * to the point where they are written out in insertion order. The output
 * has the layout of `JSON.stringify(value, null, 2)` and of `yaml.dump`.
 */

import * as yaml from "js-yaml";

export type OrderedScalar = string | number | boolean | null;

export type OrderedValue = OrderedScalar | readonly OrderedValue[] | ReadonlyMap<string, OrderedValue>;

function isSequence(value: OrderedValue): value is readonly OrderedValue[] {
  return Array.isArray(value);
}

function isMapping(value: OrderedValue): value is ReadonlyMap<string, OrderedValue> {
  return value instanceof Map;
}

export function toOrderedJson(value: OrderedValue, indent = ""): string {
  const inner = `${indent}  `;
  if (isSequence(value)) {
    if (value.length === 0) return "[]";
    return `[\n${value.map((item) => inner + toOrderedJson(item, inner)).join(",\n")}\n${indent}]`;
  }
  if (isMapping(value)) {
    if (value.size === 0) return "{}";
    const lines = [...value].map(([key, item]) => `${inner}${JSON.stringify(key)}: ${toOrderedJson(item, inner)}`);
    return `{\n${lines.join(",\n")}\n${indent}}`;
  }
  return JSON.stringify(value);
}

function yamlScalar(value: OrderedScalar): string {
  return yaml.dump(value, { lineWidth: -1 }).trimEnd();
}

/** Text that follows `key:` or `-` on the same line; undefined for a nested block. */
function inline(value: OrderedValue): string | undefined {
  if (isSequence(value)) return value.length === 0 ? "[]" : undefined;
  if (isMapping(value)) return value.size === 0 ? "{}" : undefined;
  return yamlScalar(value);
}

function yamlLines(value: OrderedValue): string[] {
  const text = inline(value);
  if (text !== undefined) return text.split("\n");

  const lines: string[] = [];
  if (isSequence(value)) {
    for (const item of value) {
      const [first, ...rest] = yamlLines(item);
      lines.push(`- ${first}`, ...rest.map((line) => `  ${line}`));
    }
    return lines;
  }
  if (isMapping(value)) {
    for (const [key, item] of value) {
      const head = `${yamlScalar(key)}:`;
      const itemText = inline(item);
      if (itemText !== undefined) {
        const [first, ...rest] = itemText.split("\n");
        lines.push(`${head} ${first}`, ...rest);
      } else {
        lines.push(head, ...yamlLines(item).map((line) => `  ${line}`));
      }
    }
  }
  return lines;
}

export function toOrderedYaml(value: OrderedValue): string {
  return `${yamlLines(value).join("\n")}\n`;
}
