import { Match } from '../alerts/alerter.interface';
import { HiveRule } from '../module/options';
import { stringifyValue } from '../utils/values';
import { resolveField } from './field.resolver';

/**
 * Adds the tags one match produces to `into`. Each spec is resolved as a field
 * name and falls back to its own text; list values contribute every element.
 * Values that stringify to `''` (`null` elements, `null` rule options) are skipped.
 */
export function aggregateTags(
  tagSpecs: readonly string[],
  match: Match,
  rule: HiveRule,
  into: Set<string> = new Set<string>(),
): Set<string> {
  for (const spec of tagSpecs) {
    const value = resolveField(match, rule.options, spec, spec);
    if (Array.isArray(value)) {
      for (const item of value) {
        addTag(into, item);
      }
      continue;
    }
    addTag(into, value);
  }

  return into;
}

function addTag(into: Set<string>, value: unknown): void {
  const tag = stringifyValue(value);
  if (tag !== '') {
    into.add(tag);
  }
}
