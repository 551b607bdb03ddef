/**
 * @fileoverview Credential context
 * @module @tasklink/clickup/credentials
 */

import { ConfigurationError } from '@tasklink/errors';

function nonEmpty(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

/**
 * Holds the token a client authenticates with, plus an optional base token
 * used to discover workspaces in multi-workspace flows. A per-call override
 * applies to exactly one call and is never stored.
 */
export class CredentialContext {
  private constructor(
    private readonly defaultToken: string,
    private readonly baseToken?: string
  ) {}

  /**
   * @throws ConfigurationError when `token` is absent or blank
   */
  static create(token: string | undefined, baseToken?: string): CredentialContext {
    if (!nonEmpty(token)) {
      throw new ConfigurationError('A non-empty ClickUp token is required', { field: 'token' });
    }
    return new CredentialContext(token, nonEmpty(baseToken) ? baseToken : undefined);
  }

  /**
   * Token for one call: the override when non-empty, else the default.
   */
  resolve(override?: string): string {
    return nonEmpty(override) ? override : this.defaultToken;
  }

  /**
   * Token for workspace discovery: the override, else the base token, else
   * the default.
   */
  resolveBase(override?: string): string {
    if (nonEmpty(override)) {
      return override;
    }
    return this.baseToken ?? this.defaultToken;
  }

  get hasBaseToken(): boolean {
    return this.baseToken !== undefined;
  }

  toJSON(): Record<string, unknown> {
    return { defaultToken: '[REDACTED]', baseToken: this.baseToken ? '[REDACTED]' : undefined };
  }
}
