/**
 * Error classes
 *
 * Only conditions that are fatal to the caller are thrown. Data gaps,
 * order rejections and rate limits are reported as structured results.
 */

import type { BrokerAdapter, BrokerCapability } from './types/broker.js';

/**
 * Invalid configuration: bad env values, bad strategy windows, missing
 * credentials, or a broker adapter lacking a required capability.
 */
export class ConfigurationError extends Error {
  readonly code = 'configuration_error';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Broker rejected a request or could not be reached.
 * The message is the broker's own text.
 */
export class BrokerError extends Error {
  readonly code = 'broker_error';

  constructor(
    message: string,
    readonly status?: number,
    readonly errorType?: string
  ) {
    super(message);
    this.name = 'BrokerError';
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Throw ConfigurationError unless the adapter supports every required capability
 */
export function assertCapabilities(
  adapter: Pick<BrokerAdapter, 'name' | 'capabilities'>,
  required: readonly BrokerCapability[]
): void {
  const missing = required.filter((capability) => adapter.capabilities[capability] !== true);
  if (missing.length > 0) {
    throw new ConfigurationError(`Broker adapter "${adapter.name}" does not support: ${missing.join(', ')}`);
  }
}
