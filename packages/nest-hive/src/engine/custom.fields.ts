import { CustomField, Match } from '../alerts/alerter.interface';
import { CustomFieldDeclaration, HiveRule } from '../module/options';
import { resolveField } from './field.resolver';

/**
 * Resolves custom field declarations against one match.
 *
 * Declarations that resolve to nothing, and values of unsupported kinds, are
 * skipped without taking an `order` slot, so emitted orders are `0..k-1`.
 */
export function buildCustomFields(
  declarations: readonly CustomFieldDeclaration[],
  match: Match,
  rule: HiveRule,
): Record<string, CustomField> {
  const fields: Record<string, CustomField> = {};
  let position = 0;

  for (const declaration of declarations) {
    let value: unknown;
    switch (declaration.value.kind) {
      case 'field':
        value = resolveField(match, rule.options, declaration.value.name, null);
        break;
      case 'literal':
        value = declaration.value.value;
        break;
      case 'unsupported':
        continue;
    }

    if (value === null || value === undefined) {
      continue;
    }

    fields[declaration.name] = { order: position, [declaration.type]: value };
    position += 1;
  }

  return fields;
}
