import jwt from 'jsonwebtoken';
import type { ITokenProvider } from '../../core/ports/ITokenProvider.js';

export interface JwtTokenProviderOptions {
  /** HMAC secret shared with Centrifugo (`token_hmac_secret_key`) */
  secret: string;
  /** User id placed in the `sub` claim */
  user: string;
  /** Token lifetime in seconds (default: 3600) */
  expiresInSeconds?: number;
  /** Connection info attached to presence and join/leave events */
  info?: Record<string, unknown>;
}

/**
 * Signs HS256 connection and subscription tokens locally.
 * Meant for development setups where the client may hold the secret.
 */
export class JwtTokenProvider implements ITokenProvider {
  private readonly expiresInSeconds: number;

  constructor(private readonly options: JwtTokenProviderOptions) {
    this.expiresInSeconds = options.expiresInSeconds || 3600;
  }

  async getConnectionToken(): Promise<string> {
    const payload = {
      sub: this.options.user,
      ...(this.options.info && { info: this.options.info }),
    };
    return jwt.sign(payload, this.options.secret, {
      algorithm: 'HS256',
      expiresIn: this.expiresInSeconds,
    });
  }

  async getSubscriptionToken(channel: string): Promise<string> {
    return jwt.sign(
      { sub: this.options.user, channel },
      this.options.secret,
      { algorithm: 'HS256', expiresIn: this.expiresInSeconds }
    );
  }
}
