/**
 * Request guards: bearer token for user routes, `x-admin-api-key` for admin routes.
 */

import { FastifyReply, FastifyRequest } from 'fastify';

import { ForbiddenError, InvalidTokenError } from '../domain/errors';
import type { TokenService } from '../users/types';

declare module 'fastify' {
  interface FastifyRequest {
    userId?: string;
  }
}

export type Guard = (req: FastifyRequest, reply: FastifyReply) => Promise<void>;

export function createAuthGuard(tokens: TokenService): Guard {
  return async (req) => {
    const header = req.headers.authorization;
    const match = header ? /^Bearer\s+(\S+)$/i.exec(header) : null;
    if (!match) {
      throw new InvalidTokenError();
    }
    req.userId = tokens.verify(match[1]);
  };
}

export function createAdminGuard(adminApiKey: string): Guard {
  return async (req) => {
    const key = req.headers['x-admin-api-key'];
    if (typeof key !== 'string' || key !== adminApiKey) {
      throw new ForbiddenError();
    }
  };
}

/** The authenticated user id; only valid behind the auth guard */
export function currentUserId(req: FastifyRequest): string {
  if (!req.userId) {
    throw new InvalidTokenError();
  }
  return req.userId;
}
