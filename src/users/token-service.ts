import jwt from 'jsonwebtoken';

import { ExpiredTokenError, InvalidTokenError } from '../domain/errors';
import type { AccessToken, TokenService } from './types';

export interface JwtConfig {
  secret: string;
  expiresInMinutes: number;
}

/** HS256 bearer tokens whose subject is the user id */
export class JwtTokenService implements TokenService {
  constructor(private readonly config: JwtConfig) {}

  issue(subject: string): AccessToken {
    const expiresIn = this.config.expiresInMinutes * 60;
    const accessToken = jwt.sign({}, this.config.secret, {
      algorithm: 'HS256',
      subject,
      expiresIn,
    });
    return { accessToken, tokenType: 'bearer', expiresIn };
  }

  verify(token: string): string {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.config.secret, { algorithms: ['HS256'] });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) throw new ExpiredTokenError();
      throw new InvalidTokenError();
    }

    if (typeof payload === 'string' || !payload.sub) {
      throw new InvalidTokenError();
    }
    return payload.sub;
  }
}
