/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Connector error hierarchy.
 */

/** Normalize a thrown value for the error hooks and log lines. */
export const asError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));

/** Base class for every error raised by the connector itself. */
export class DeviceRestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeviceRestError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Invalid or incomplete connection setup, or a payload the connector cannot encode. */
export class ConfigurationError extends DeviceRestError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class NotConnectedError extends DeviceRestError {
  constructor(
    public readonly device: string,
    public readonly alias: string,
  ) {
    super(`'${device}' is not connected for alias '${alias}'`);
    this.name = 'NotConnectedError';
  }
}

/**
 * The device answered with a status code outside the accepted set.
 * `body` holds the raw response text.
 */
export class UnexpectedStatusError extends DeviceRestError {
  constructor(
    message: string,
    public readonly device: string,
    public readonly statusCode: number,
    public readonly expectedStatusCodes: readonly number[],
    public readonly body: string,
  ) {
    super(message);
    this.name = 'UnexpectedStatusError';
  }

  static forResponse(
    device: string,
    statusCode: number,
    expectedStatusCodes: readonly number[],
    body: string,
  ): UnexpectedStatusError {
    return new UnexpectedStatusError(
      `'${statusCode}' result code has been returned instead of the expected ` +
        `status code(s) '${expectedStatusCodes.join(', ')}' for '${device}'\n${body}`,
      device,
      statusCode,
      expectedStatusCodes,
      body,
    );
  }
}
