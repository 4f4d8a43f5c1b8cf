import { Artifact, HiveAlertPayload, Match, TEMPLATE_FIELDS } from '../alerts/alerter.interface';
import { BatchSummaryRenderer } from '../alerts/template.renderer';
import { HiveAlertConfig, HiveRule } from '../module/options';
import { truncateToSecondMs } from '../utils/time';
import { buildCustomFields } from './custom.fields';
import { extractArtifacts } from './observable.extractor';
import { aggregateTags } from './tag.aggregator';
import { substituteArgs } from './template.args';

/** Collaborators the assembler needs beyond the rule itself. */
export interface AssembleContext {
  renderer: BatchSummaryRenderer;
  now: () => number;
  generateId: () => string;
}

/** Alert fields before any `alert_config` override is applied. */
interface AlertDefaults {
  title: string;
  description: string;
  date: number;
  sourceRef: string;
}

/**
 * Builds the payload for one match batch.
 *
 * Artifacts and tags are collected from every match. Custom fields and the
 * templated text fields are computed from the first match only.
 */
export function assembleAlert(matches: readonly Match[], rule: HiveRule, context: AssembleContext): HiveAlertPayload {
  const payload = applyAlertConfig(
    {
      title: context.renderer.title(matches, rule),
      description: context.renderer.body(matches, rule),
      date: truncateToSecondMs(context.now()),
      sourceRef: context.generateId(),
    },
    rule.alertConfig,
  );

  const tags = new Set<string>();
  let artifacts: Artifact[] = [];
  for (const match of matches) {
    artifacts = artifacts.concat(extractArtifacts(rule, match));
    aggregateTags(rule.alertConfig.tags, match, rule, tags);
  }
  payload.artifacts = artifacts;
  payload.tags = Array.from(tags);

  const first = matches[0];
  if (first !== undefined) {
    payload.customFields = buildCustomFields(rule.alertConfig.customFields, first, rule);
    for (const field of TEMPLATE_FIELDS) {
      const template = payload[field];
      if (typeof template === 'string') {
        payload[field] = substituteArgs(field, template, rule, first);
      }
    }
  }

  return payload;
}

/** Layers typed `alert_config` overrides over generated defaults. */
function applyAlertConfig(defaults: AlertDefaults, config: HiveAlertConfig): HiveAlertPayload {
  const payload: HiveAlertPayload = {
    ...config.extra,
    ...defaults,
    artifacts: [],
    customFields: {},
    tags: [],
  };

  if (config.title !== undefined) {
    payload.title = config.title;
  }
  if (config.description !== undefined) {
    payload.description = config.description;
  }
  if (config.date !== undefined) {
    payload.date = config.date;
  }

  const optional = {
    type: config.type,
    source: config.source,
    severity: config.severity,
    tlp: config.tlp,
    pap: config.pap,
    status: config.status,
    follow: config.follow,
    caseTemplate: config.caseTemplate,
    externalLink: config.externalLink,
  };
  for (const [key, value] of Object.entries(optional)) {
    if (value !== undefined) {
      payload[key] = value;
    }
  }

  return payload;
}
