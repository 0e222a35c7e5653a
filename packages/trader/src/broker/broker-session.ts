/**
 * Broker session
 *
 * Holds the API key and access token for one broker account. Owned by
 * whoever builds the adapter and passed in explicitly; there is no
 * process-wide session.
 */

import { BrokerError, ConfigurationError } from '@crossover-bot/shared';

export interface BrokerSessionOptions {
  apiKey: string;
  accessToken?: string;
  /** Lifetime of `accessToken`; omitted means no expiry */
  expiresInSeconds?: number;
  /** Clock (Unix ms), injectable for tests */
  now?: () => number;
}

export class BrokerSession {
  readonly apiKey: string;
  private accessToken: string | null = null;
  private expiresAt: number | null = null;
  private readonly now: () => number;

  /**
   * @throws ConfigurationError when apiKey is empty
   */
  constructor(options: BrokerSessionOptions) {
    if (!options.apiKey.trim()) {
      throw new ConfigurationError('Broker API key is not configured (KITE_API_KEY)');
    }
    this.apiKey = options.apiKey;
    this.now = options.now ?? Date.now;

    if (options.accessToken) {
      this.setAccessToken(options.accessToken, options.expiresInSeconds);
    }
  }

  setAccessToken(token: string, expiresInSeconds?: number): void {
    this.accessToken = token;
    this.expiresAt = expiresInSeconds && expiresInSeconds > 0 ? this.now() + expiresInSeconds * 1000 : null;
  }

  /**
   * Token present and not past its expiry
   */
  isAuthenticated(): boolean {
    if (!this.accessToken) return false;
    return this.expiresAt === null || this.now() <= this.expiresAt;
  }

  /**
   * Value for the Authorization header
   *
   * @throws BrokerError when the session is not authenticated
   */
  authorizationHeader(): string {
    if (!this.accessToken || !this.isAuthenticated()) {
      throw new BrokerError('Broker session is not authenticated');
    }
    return `token ${this.apiKey}:${this.accessToken}`;
  }

  /**
   * Drop credentials; the session reports unauthenticated afterwards
   */
  teardown(): void {
    this.accessToken = null;
    this.expiresAt = null;
  }
}
