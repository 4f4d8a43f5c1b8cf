/** Error codes raised by the alerter. */
export enum HiveErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  DELIVERY_FAILED = 'DELIVERY_FAILED',
}

/** Base class for errors raised by `nest-hive`. */
export class HiveError extends Error {
  constructor(
    readonly code: HiveErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Rule or module configuration that cannot be normalized. */
export class HiveConfigError extends HiveError {
  constructor(message: string) {
    super(HiveErrorCode.CONFIG_INVALID, `[nest-hive] ${message}`);
  }
}

/** Transport failure, timeout or non-2xx response while posting an alert. */
export class DeliveryError extends HiveError {
  /** HTTP status when the remote API answered with a non-2xx code. */
  readonly status?: number;

  constructor(message: string, details: { cause?: unknown; status?: number } = {}) {
    super(HiveErrorCode.DELIVERY_FAILED, message, { cause: details.cause });
    this.status = details.status;
  }
}
