/**
 * Auth Interactors: registration, login and password reset
 */

import { randomBytes } from 'crypto';
import { v4 as uuidv4 } from 'uuid';

import {
  ConflictError,
  ExpiredTokenError,
  InvalidCredentialsError,
  NotFoundError,
  TooManyRequestsError,
} from '../domain/errors';
import { Email, Password } from '../domain/value-objects';
import type { UnitOfWork } from '../database/unit-of-work';
import type { EmailGateway } from '../notifications/email-gateway';
import { logger } from '../observability/logger';
import type { RateLimiter } from '../security/rate-limiter';
import type { UserRepository } from './user-repository';
import type {
  AccessToken,
  LoginInput,
  PasswordHasher,
  RegisterUserInput,
  ResetPasswordInput,
  TokenService,
  User,
} from './types';

const log = logger.child({ component: 'auth' });

export class RegisterUserInteractor {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly hasher: PasswordHasher,
    private readonly mail: EmailGateway,
  ) {}

  async execute(input: RegisterUserInput): Promise<string> {
    const email = Email.parse(input.email);
    const password = Password.parse(input.password);
    const passwordHash = await this.hasher.hash(password.value);

    const user = await this.uow.run(async (scope) => {
      if (await scope.users.existsByEmail(email)) {
        throw new ConflictError(`User already exists: ${email.value}`);
      }

      const created: User = {
        id: uuidv4(),
        email: email.value,
        username: input.username.trim(),
        passwordHash,
        isActive: true,
        createdAt: new Date().toISOString(),
      };
      await scope.users.save(created);
      await scope.commit();
      return created;
    });

    log.info({ userId: user.id }, 'User registered');

    try {
      await this.mail.sendRegistrationEmail(user.email, user.username);
    } catch (err) {
      log.warn({ err, userId: user.id }, 'Registration email failed');
    }
    return user.id;
  }
}

export class LoginInteractor {
  constructor(
    private readonly users: UserRepository,
    private readonly hasher: PasswordHasher,
    private readonly tokens: TokenService,
    private readonly limiter: RateLimiter,
  ) {}

  async execute(input: LoginInput): Promise<AccessToken> {
    const email = Email.parse(input.email);
    const limiterKey = `${input.clientKey ?? 'unknown'}:${email.value}`;

    const check = this.limiter.check(limiterKey);
    if (!check.allowed) {
      throw new TooManyRequestsError(check.retryAfterMs);
    }

    const user = await this.users.findByEmail(email);
    if (!user || !user.isActive) {
      throw new InvalidCredentialsError();
    }
    if (!(await this.hasher.verify(input.password, user.passwordHash))) {
      throw new InvalidCredentialsError();
    }

    this.limiter.reset(limiterKey);
    log.info({ userId: user.id }, 'User logged in');
    return this.tokens.issue(user.id);
  }
}

export class RequestPasswordResetInteractor {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly mail: EmailGateway,
    private readonly ttlMinutes: number,
  ) {}

  /** Resolves the same way whether or not the email is registered */
  async execute(rawEmail: string): Promise<void> {
    const email = Email.parse(rawEmail);

    const issued = await this.uow.run(async (scope) => {
      const user = await scope.users.findByEmail(email);
      if (!user) return null;

      const now = Date.now();
      const token = randomBytes(32).toString('base64url');
      await scope.resetTokens.save({
        id: uuidv4(),
        userId: user.id,
        token,
        expiresAt: new Date(now + this.ttlMinutes * 60_000).toISOString(),
        used: false,
        createdAt: new Date(now).toISOString(),
      });
      await scope.commit();
      return { user, token };
    });

    if (!issued) {
      log.info('Password reset requested for unknown email');
      return;
    }

    log.info({ userId: issued.user.id }, 'Password reset token issued');
    try {
      await this.mail.sendPasswordResetEmail(issued.user.email, issued.user.username, issued.token);
    } catch (err) {
      log.warn({ err, userId: issued.user.id }, 'Password reset email failed');
    }
  }
}

export class ResetPasswordInteractor {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly hasher: PasswordHasher,
  ) {}

  async execute(input: ResetPasswordInput): Promise<void> {
    const password = Password.parse(input.newPassword);
    const passwordHash = await this.hasher.hash(password.value);

    const userId = await this.uow.run(async (scope) => {
      const token = await scope.resetTokens.findByToken(input.token);
      if (!token || token.used || Date.parse(token.expiresAt) <= Date.now()) {
        throw new ExpiredTokenError();
      }

      const user = await scope.users.findById(token.userId);
      if (!user) {
        throw new NotFoundError('user', token.userId);
      }

      await scope.users.save({ ...user, passwordHash });
      await scope.resetTokens.save({ ...token, used: true });
      await scope.commit();
      return user.id;
    });

    log.info({ userId }, 'Password reset completed');
  }
}
