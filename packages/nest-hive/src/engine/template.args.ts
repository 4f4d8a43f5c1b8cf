import { Match, TemplateField } from '../alerts/alerter.interface';
import { formatPositional } from '../alerts/template.renderer';
import { HiveRule } from '../module/options';
import { hasContent } from '../utils/values';
import { resolveField } from './field.resolver';

export const DEFAULT_MISSING_VALUE = '<MISSING VALUE>';

/**
 * Fills `template` with the values named by `alert_config.<field>_args`.
 * Returns the template unchanged when the field has no args.
 */
export function substituteArgs(field: TemplateField, template: string, rule: HiveRule, match: Match): string {
  const argSpecs = rule.alertConfig.args[field];
  if (!argSpecs) {
    return template;
  }

  const missing = rule.alertConfig.missingValues[field] ?? DEFAULT_MISSING_VALUE;
  const values = argSpecs.map((spec) => {
    const value = resolveField(match, rule.options, spec, missing);
    if (value !== null && value !== undefined) {
      return value;
    }

    // null only comes from a rule option set to null; use the raw option if it holds anything
    const option = rule.options[spec];
    return hasContent(option) ? option : missing;
  });

  return formatPositional(template, values);
}
