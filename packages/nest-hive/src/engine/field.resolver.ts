import { Match } from '../alerts/alerter.interface';
import { isRecord } from '../utils/values';

const NOT_FOUND: unique symbol = Symbol('not-found');

/**
 * Looks a field up in a match using dotted paths.
 *
 * The whole path is tried as a literal key first. Otherwise segments are joined
 * left to right until they name a key at the current level, so keys that
 * contain dots are reachable: with `{ 'a.b': { c: 1 } }`, `a.b.c` resolves to `1`.
 * Returns `undefined` when the path does not exist.
 */
export function lookupMatchField(match: Match, path: string): unknown {
  const value = findByPath(match, path);
  return value === NOT_FOUND ? undefined : value;
}

/**
 * Resolves a field from the match, then from the rule's top-level options,
 * then falls back to `fallback`. A `null` stored in the match counts as absent;
 * a rule option that is present is returned even when it is `null`.
 */
export function resolveField(
  match: Match,
  ruleOptions: Readonly<Record<string, unknown>>,
  fieldName: string,
  fallback: unknown,
): unknown {
  const fromMatch = lookupMatchField(match, fieldName);
  if (fromMatch !== undefined && fromMatch !== null) {
    return fromMatch;
  }

  if (Object.prototype.hasOwnProperty.call(ruleOptions, fieldName)) {
    return ruleOptions[fieldName];
  }

  return fallback;
}

function findByPath(root: Readonly<Record<string, unknown>>, path: string): unknown {
  if (Object.prototype.hasOwnProperty.call(root, path)) {
    return root[path];
  }

  const parts = path.split('.');
  let cursor: Readonly<Record<string, unknown>> = root;
  let pending = '';

  for (let i = 0; i < parts.length; i += 1) {
    pending += parts[i];
    const last = i === parts.length - 1;

    if (!Object.prototype.hasOwnProperty.call(cursor, pending)) {
      if (last) {
        return NOT_FOUND;
      }
      pending += '.';
      continue;
    }

    const next = cursor[pending];
    if (last) {
      return next;
    }
    if (!isRecord(next)) {
      return NOT_FOUND;
    }
    cursor = next;
    pending = '';
  }

  return NOT_FOUND;
}
