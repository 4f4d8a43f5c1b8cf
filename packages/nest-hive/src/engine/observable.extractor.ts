import { Artifact, Match } from '../alerts/alerter.interface';
import { HiveRule } from '../module/options';
import { stringifyValue } from '../utils/values';
import { resolveField } from './field.resolver';

export const DEFAULT_ARTIFACT_TLP = 2;

/** Builds the artifacts one match contributes, in mapping order. */
export function extractArtifacts(rule: HiveRule, match: Match): Artifact[] {
  const artifacts: Artifact[] = [];

  for (const mapping of rule.observableMappings) {
    if (!mapping.primary) {
      continue;
    }

    const data = stringifyValue(resolveField(match, rule.options, mapping.primary.field, ''));
    if (data.length === 0) {
      continue;
    }

    artifacts.push({
      dataType: mapping.primary.dataType,
      data,
      tlp: mapping.tlp ?? DEFAULT_ARTIFACT_TLP,
      tags: mapping.tags ? [...mapping.tags] : [],
      message: mapping.message ?? null,
    });
  }

  return artifacts;
}
