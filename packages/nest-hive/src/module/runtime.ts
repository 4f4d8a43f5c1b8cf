import { AlertDelivery, Alerter, HiveAlerterInfo, HiveAlertPayload, Match } from '../alerts/alerter.interface';
import { HiveDeliveryClient } from '../alerts/hive.delivery';
import { assembleAlert } from '../engine/alert.assembler';
import { DeliveryError } from '../errors';
import { HiveLogEvent, HiveLogger, HiveLogLevel, HiveLogRecord, LoggerPort } from '../utils/logger';
import { HiveModuleOptions, HiveResolvedOptions, resolveHiveModuleOptions } from './options';

/** Builds TheHive alerts for a rule and posts them through the configured delivery. */
export class HiveRuntime implements Alerter {
  private readonly logger: LoggerPort;
  private readonly options: HiveResolvedOptions;
  private readonly delivery: AlertDelivery;

  /** Normalizes options and creates the HTTP client unless a custom delivery is given. */
  constructor(input: HiveModuleOptions) {
    this.options = resolveHiveModuleOptions(input);
    this.logger = this.options.logger ?? new HiveLogger();
    this.delivery = this.options.delivery ?? new HiveDeliveryClient(this.options.rule.connection);
  }

  /** Returns normalized runtime options (useful for diagnostics and tests). */
  getOptions(): HiveResolvedOptions {
    return this.options;
  }

  /** Assembles the payload for a match batch without sending it. */
  buildAlert(matches: readonly Match[]): HiveAlertPayload {
    const { rule, renderer, now, generateId } = this.options;
    return assembleAlert(matches, rule, { renderer, now, generateId });
  }

  /** Builds and delivers one alert. Delivery failures are logged and rethrown. */
  async alert(matches: readonly Match[]): Promise<void> {
    const payload = this.buildAlert(matches);
    this.log('debug', 'alert-built', {
      sourceRef: payload.sourceRef,
      matches: matches.length,
      artifacts: payload.artifacts.length,
      tags: payload.tags.length,
    });

    try {
      await this.delivery.deliver(payload);
    } catch (error) {
      this.log('error', 'alert-failed', {
        rule: this.options.rule.name,
        sourceRef: payload.sourceRef,
        error: error instanceof Error ? error.message : String(error),
        status: error instanceof DeliveryError ? error.status : undefined,
      });
      throw error;
    }

    this.log('info', 'alert-sent', {
      rule: this.options.rule.name,
      sourceRef: payload.sourceRef,
      host: this.options.rule.connection.host,
    });
  }

  describe(): HiveAlerterInfo {
    return {
      type: 'hivealerter',
      host: this.options.rule.connection.configuredHost,
    };
  }

  private log(level: HiveLogLevel, event: HiveLogEvent, meta: Record<string, unknown>): void {
    if (!this.options.logging) {
      return;
    }

    const record: HiveLogRecord = { event };
    for (const [key, value] of Object.entries(meta)) {
      if (value !== undefined) {
        record[key] = value;
      }
    }
    this.logger[level]('TheHive alert', record);
  }
}
