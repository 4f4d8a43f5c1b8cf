import { Match } from './alerter.interface';
import { HiveRule } from '../module/options';
import { stringifyValue } from '../utils/values';

const POSITIONAL_PATTERN = /\{\{|\}\}|\{(\d*)\}/g;
const MATCH_SEPARATOR = `\n${'-'.repeat(40)}\n`;

/** Builds default alert title and description for a match batch. */
export interface BatchSummaryRenderer {
  title(matches: readonly Match[], rule: HiveRule): string;
  body(matches: readonly Match[], rule: HiveRule): string;
}

/**
 * Formats `values` into `{0}`, `{1}`, ... placeholders. `{}` takes the next
 * value in order, `{{` and `}}` produce literal braces, and a placeholder with
 * no matching value is left as written.
 */
export function formatPositional(template: string, values: readonly unknown[]): string {
  if (!template) {
    return '';
  }

  let auto = 0;
  return template.replace(POSITIONAL_PATTERN, (token: string, index: string | undefined) => {
    if (token === '{{') {
      return '{';
    }
    if (token === '}}') {
      return '}';
    }

    const position = index ? Number(index) : auto++;
    if (position >= values.length) {
      return token;
    }
    return stringifyValue(values[position]);
  });
}

/** Renders one match as the rule name followed by `key: value` lines. */
export function renderMatchSummary(match: Match, rule: HiveRule): string {
  const lines = Object.entries(match).map(([key, value]) => `${key}: ${stringifyValue(value)}`);
  if (lines.length === 0) {
    return rule.name;
  }
  return `${rule.name}\n\n${lines.join('\n')}`;
}

export const defaultBatchSummaryRenderer: BatchSummaryRenderer = {
  title(_matches, rule) {
    const subject = rule.options.alert_subject;
    return typeof subject === 'string' && subject.trim() ? subject : rule.name;
  },
  body(matches, rule) {
    return matches.map((match) => renderMatchSummary(match, rule)).join(MATCH_SEPARATOR);
  },
};
