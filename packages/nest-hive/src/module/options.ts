import { randomUUID } from 'node:crypto';
import { AlertDelivery, TemplateField, TEMPLATE_FIELDS } from '../alerts/alerter.interface';
import { BatchSummaryRenderer, defaultBatchSummaryRenderer } from '../alerts/template.renderer';
import { HiveConfigError } from '../errors';
import { LoggerPort } from '../utils/logger';
import { nowMs } from '../utils/time';
import { isRecord } from '../utils/values';

/** Proxy URLs keyed by target protocol. Empty strings mean "connect directly". */
export interface HiveProxies {
  http?: string;
  https?: string;
}

/** Connection settings as written in a rule. */
export interface RawHiveConnection {
  host?: string;
  port?: number;
  apiKey?: string;
  proxies?: HiveProxies;
  verifyTLS?: boolean;
  /** Request timeout; invalid values fall back to 10 seconds. */
  timeoutMs?: number;
}

/** Rule configuration as produced by the rule loader (YAML/JSON shaped). */
export interface RawHiveRule {
  name?: string;
  connection?: RawHiveConnection;
  alert_config?: Record<string, unknown>;
  observable_data_mapping?: unknown[];
  [option: string]: unknown;
}

/** Normalized connection settings. */
export interface HiveResolvedConnection {
  /** Host exactly as configured (`''` when omitted); reported by `describe()`. */
  configuredHost: string;
  host: string;
  port: number;
  apiKey: string;
  proxies: Required<HiveProxies>;
  verifyTLS: boolean;
  timeoutMs: number;
}

/** Custom field value source, decided once when the rule is loaded. */
export type CustomFieldValue =
  | { kind: 'field'; name: string }
  | { kind: 'literal'; value: number }
  | { kind: 'unsupported'; raw: unknown };

export interface CustomFieldDeclaration {
  name: string;
  type: string;
  value: CustomFieldValue;
}

/** One observable rule. `primary` is absent when the entry only carries auxiliary keys. */
export interface ObservableMapping {
  primary?: {
    dataType: string;
    field: string;
  };
  tlp?: number;
  message?: string;
  tags?: string[];
}

/** Typed `alert_config` overrides layered on top of alert defaults. */
export interface HiveAlertConfig {
  title?: string;
  description?: string;
  /** Epoch milliseconds replacing the generated timestamp. */
  date?: number;
  type?: string;
  source?: string;
  severity?: number;
  tlp?: number;
  pap?: number;
  status?: string;
  follow?: boolean;
  caseTemplate?: string;
  externalLink?: string;
  /** Tag specs: field names to resolve, or literal tags. */
  tags: string[];
  customFields: CustomFieldDeclaration[];
  /** `<field>_args` lists. */
  args: Partial<Record<TemplateField, string[]>>;
  /** `<field>_missing_value` markers; also copied onto the payload through `extra`. */
  missingValues: Partial<Record<TemplateField, string>>;
  /** Any other key, copied onto the payload as-is. A configured `artifacts` lands here and is replaced by the computed list. */
  extra: Record<string, unknown>;
}

/** Rule consumed by the assembler. */
export interface HiveRule {
  name: string;
  /** Every top-level option of the raw rule; consulted when a field is missing from a match. */
  options: Readonly<Record<string, unknown>>;
  alertConfig: HiveAlertConfig;
  observableMappings: ObservableMapping[];
  connection: HiveResolvedConnection;
}

/** Top-level `HiveModule` configuration. */
export interface HiveModuleOptions {
  rule: RawHiveRule;
  logging?: boolean;
  logger?: LoggerPort;
  /** Produces default title/description from the match batch. */
  renderer?: BatchSummaryRenderer;
  /** Replaces the HTTP client, e.g. with an in-memory recorder. */
  delivery?: AlertDelivery;
  now?: () => number;
  generateId?: () => string;
}

/** Fully normalized runtime options resolved from `HiveModuleOptions`. */
export interface HiveResolvedOptions {
  rule: HiveRule;
  logging: boolean;
  logger?: LoggerPort;
  renderer: BatchSummaryRenderer;
  delivery?: AlertDelivery;
  now: () => number;
  generateId: () => string;
}

export const DEFAULT_HIVE_HOST = 'http://localhost';
export const DEFAULT_HIVE_PORT = 9000;
export const DEFAULT_TIMEOUT_MS = 10000;
export const DEFAULT_RULE_NAME = 'unnamed rule';

const OBSERVABLE_AUX_KEYS = new Set(['tlp', 'message', 'tags']);
const STRING_ALERT_KEYS = ['title', 'description', 'type', 'source', 'status', 'caseTemplate', 'externalLink'] as const;
const NUMBER_ALERT_KEYS = ['date', 'severity', 'tlp', 'pap'] as const;
const TEMPLATE_ARGS_PATTERN = /^(description|title|type|source)_(args|missing_value)$/;

/** Validates and normalizes user config into runtime-ready options. */
export function resolveHiveModuleOptions(input: HiveModuleOptions): HiveResolvedOptions {
  return {
    rule: resolveHiveRule(input.rule),
    logging: input.logging ?? true,
    logger: input.logger,
    renderer: input.renderer ?? defaultBatchSummaryRenderer,
    delivery: input.delivery,
    now: input.now ?? nowMs,
    generateId: input.generateId ?? randomUUID,
  };
}

/** Normalizes a raw rule. Throws `HiveConfigError` when a required option is missing or malformed. */
export function resolveHiveRule(raw: RawHiveRule): HiveRule {
  if (!isRecord(raw.connection)) {
    throw new HiveConfigError('rule option "connection" is required');
  }
  if (!isRecord(raw.alert_config)) {
    throw new HiveConfigError('rule option "alert_config" is required');
  }

  return {
    name: typeof raw.name === 'string' && raw.name.trim() ? raw.name : DEFAULT_RULE_NAME,
    options: raw,
    alertConfig: resolveAlertConfig(raw.alert_config),
    observableMappings: resolveObservableMappings(raw.observable_data_mapping),
    connection: resolveConnection(raw.connection),
  };
}

function resolveConnection(input: Record<string, unknown>): HiveResolvedConnection {
  const host = optionalString(input, 'host', 'connection');
  const port = optionalNumber(input, 'port', 'connection');
  const apiKey = optionalString(input, 'apiKey', 'connection');
  const verifyTLS = optionalBoolean(input, 'verifyTLS', 'connection');
  const timeoutMs = optionalNumber(input, 'timeoutMs', 'connection');

  const rawProxies = input.proxies;
  if (rawProxies !== undefined && rawProxies !== null && !isRecord(rawProxies)) {
    throw new HiveConfigError('connection.proxies must be an object with "http"/"https" URLs');
  }
  const proxies: Record<string, unknown> = isRecord(rawProxies) ? rawProxies : {};

  return {
    configuredHost: host ?? '',
    host: host?.trim() || DEFAULT_HIVE_HOST,
    port: port ?? DEFAULT_HIVE_PORT,
    apiKey: apiKey ?? '',
    proxies: {
      http: optionalString(proxies, 'http', 'connection.proxies') ?? '',
      https: optionalString(proxies, 'https', 'connection.proxies') ?? '',
    },
    verifyTLS: verifyTLS ?? false,
    timeoutMs: normalizePositiveInt(timeoutMs, DEFAULT_TIMEOUT_MS),
  };
}

function resolveAlertConfig(input: Record<string, unknown>): HiveAlertConfig {
  const config: HiveAlertConfig = {
    tags: [],
    customFields: [],
    args: {},
    missingValues: {},
    extra: {},
  };

  for (const key of STRING_ALERT_KEYS) {
    config[key] = optionalString(input, key, 'alert_config');
  }
  for (const key of NUMBER_ALERT_KEYS) {
    config[key] = optionalNumber(input, key, 'alert_config');
  }
  config.follow = optionalBoolean(input, 'follow', 'alert_config');
  config.tags = stringList(input.tags, 'alert_config.tags');
  config.customFields = resolveCustomFields(input.customFields);

  const handled = new Set<string>([...STRING_ALERT_KEYS, ...NUMBER_ALERT_KEYS, 'follow', 'tags', 'customFields']);
  for (const [key, value] of Object.entries(input)) {
    if (handled.has(key)) {
      continue;
    }

    if (key === 'sourceRef') {
      throw new HiveConfigError('alert_config.sourceRef is generated per alert and cannot be configured');
    }

    const templateKey = key.match(TEMPLATE_ARGS_PATTERN);
    if (templateKey && isTemplateField(templateKey[1])) {
      const field = templateKey[1];
      if (templateKey[2] === 'args') {
        config.args[field] = stringList(value, `alert_config.${key}`);
        continue;
      }
      config.missingValues[field] = optionalString(input, key, 'alert_config');
    }

    config.extra[key] = value;
  }

  return config;
}

function resolveCustomFields(input: unknown): CustomFieldDeclaration[] {
  if (input === undefined || input === null) {
    return [];
  }
  if (!Array.isArray(input)) {
    throw new HiveConfigError('alert_config.customFields must be a list of {name, type, value}');
  }

  return input.map((item, index) => {
    const path = `alert_config.customFields[${index}]`;
    if (!isRecord(item) || typeof item.name !== 'string' || typeof item.type !== 'string') {
      throw new HiveConfigError(`${path} requires string "name" and "type"`);
    }
    return { name: item.name, type: item.type, value: toCustomFieldValue(item.value) };
  });
}

function toCustomFieldValue(value: unknown): CustomFieldValue {
  if (typeof value === 'string') {
    return { kind: 'field', name: value };
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return { kind: 'literal', value };
  }
  return { kind: 'unsupported', raw: value };
}

function resolveObservableMappings(input: unknown): ObservableMapping[] {
  if (input === undefined || input === null) {
    return [];
  }
  if (!Array.isArray(input)) {
    throw new HiveConfigError('observable_data_mapping must be a list');
  }

  return input.map((entry, index) => {
    const path = `observable_data_mapping[${index}]`;
    if (!isRecord(entry)) {
      throw new HiveConfigError(`${path} must be an object`);
    }

    const mapping: ObservableMapping = {
      tlp: optionalNumber(entry, 'tlp', path),
      message: optionalString(entry, 'message', path),
      tags: entry.tags === undefined || entry.tags === null ? undefined : stringList(entry.tags, `${path}.tags`),
    };

    const primaryKey = Object.keys(entry).find((key) => !OBSERVABLE_AUX_KEYS.has(key));
    if (primaryKey !== undefined) {
      const field = entry[primaryKey];
      if (typeof field !== 'string') {
        throw new HiveConfigError(`${path}.${primaryKey} must name a match field`);
      }
      mapping.primary = { dataType: primaryKey, field };
    }

    return mapping;
  });
}

function isTemplateField(value: string | undefined): value is TemplateField {
  return TEMPLATE_FIELDS.some((field) => field === value);
}

function stringList(value: unknown, path: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new HiveConfigError(`${path} must be a list`);
  }
  return value.map((item) => String(item));
}

function optionalString(input: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = input[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new HiveConfigError(`${path}.${key} must be a string`);
  }
  return value;
}

function optionalNumber(input: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = input[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new HiveConfigError(`${path}.${key} must be a number`);
  }
  return value;
}

function optionalBoolean(input: Record<string, unknown>, key: string, path: string): boolean | undefined {
  const value = input[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new HiveConfigError(`${path}.${key} must be a boolean`);
  }
  return value;
}

function normalizePositiveInt(value: number | undefined, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return Math.max(1, Math.floor(value));
}
