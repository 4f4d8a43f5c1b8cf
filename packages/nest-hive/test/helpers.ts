import { HiveRule, RawHiveRule, resolveHiveRule } from '../src/module/options';

/** Normalized rule with empty connection/alert config unless overridden. */
export function makeRule(raw: Partial<RawHiveRule> = {}): HiveRule {
  return resolveHiveRule({
    name: 'test-rule',
    connection: {},
    alert_config: {},
    ...raw,
  });
}
