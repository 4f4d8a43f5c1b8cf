import 'reflect-metadata';

export * from './alerts/alerter.interface';
export { BatchSummaryRenderer, defaultBatchSummaryRenderer, formatPositional } from './alerts/template.renderer';
export { HiveDeliveryClient } from './alerts/hive.delivery';
export { assembleAlert, AssembleContext } from './engine/alert.assembler';
export { buildCustomFields } from './engine/custom.fields';
export { lookupMatchField, resolveField } from './engine/field.resolver';
export { extractArtifacts } from './engine/observable.extractor';
export { aggregateTags } from './engine/tag.aggregator';
export { DEFAULT_MISSING_VALUE, substituteArgs } from './engine/template.args';
export * from './errors';
export { HiveModule } from './module/hive.module';
export { HIVE_OPTIONS } from './module/hive.tokens';
export * from './module/options';
export { HiveRuntime } from './module/runtime';
export { HiveLogEvent, HiveLogger, HiveLogLevel, HiveLogRecord, LoggerPort } from './utils/logger';
export { canonicalJson } from './utils/canonical';
