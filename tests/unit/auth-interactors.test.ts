import type { Database } from '../../src/database/schema';
import { KyselyUnitOfWork } from '../../src/database/unit-of-work';
import {
  ConflictError,
  ExpiredTokenError,
  InvalidCredentialsError,
  TooManyRequestsError,
  ValidationError,
} from '../../src/domain/errors';
import type { EmailGateway } from '../../src/notifications/email-gateway';
import { RateLimiter } from '../../src/security/rate-limiter';
import {
  LoginInteractor,
  RegisterUserInteractor,
  RequestPasswordResetInteractor,
  ResetPasswordInteractor,
} from '../../src/users/auth-interactors';
import { BcryptPasswordHasher } from '../../src/users/password-hasher';
import { JwtTokenService } from '../../src/users/token-service';
import { UserRepository } from '../../src/users/user-repository';
import { createTestDatabase } from '../helpers/test-db';

class RecordingEmailGateway implements EmailGateway {
  registrations: string[] = [];
  resets: Array<{ to: string; token: string }> = [];

  async sendRegistrationEmail(to: string): Promise<void> {
    this.registrations.push(to);
  }

  async sendPasswordResetEmail(to: string, _username: string, resetToken: string): Promise<void> {
    this.resets.push({ to, token: resetToken });
  }
}

describe('auth interactors', () => {
  const password = 'Str0ng!pass';

  let db: Database;
  let mail: RecordingEmailGateway;
  let tokens: JwtTokenService;
  let register: RegisterUserInteractor;
  let login: LoginInteractor;
  let requestReset: RequestPasswordResetInteractor;
  let resetPassword: ResetPasswordInteractor;

  beforeEach(async () => {
    db = await createTestDatabase();
    const uow = new KyselyUnitOfWork(db);
    const hasher = new BcryptPasswordHasher(4);
    mail = new RecordingEmailGateway();
    tokens = new JwtTokenService({ secret: 'test-secret', expiresInMinutes: 30 });

    register = new RegisterUserInteractor(uow, hasher, mail);
    login = new LoginInteractor(new UserRepository(db), hasher, tokens, new RateLimiter(3, 60));
    requestReset = new RequestPasswordResetInteractor(uow, mail, 60);
    resetPassword = new ResetPasswordInteractor(uow, hasher);
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe('RegisterUserInteractor', () => {
    it('should store the user with a hashed password and send a welcome email', async () => {
      const id = await register.execute({ email: 'Alice@Example.com', password, username: 'alice' });

      const row = await db.selectFrom('users').selectAll().where('id', '=', id).executeTakeFirstOrThrow();
      expect(row.email).toBe('alice@example.com');
      expect(row.password_hash).not.toBe(password);
      expect(row.is_active).toBe(1);
      expect(mail.registrations).toEqual(['alice@example.com']);
    });

    it('should reject a duplicate email regardless of case', async () => {
      await register.execute({ email: 'alice@example.com', password, username: 'alice' });
      await expect(
        register.execute({ email: 'ALICE@example.com', password, username: 'alice2' }),
      ).rejects.toThrow(ConflictError);
    });

    it('should reject a weak password', async () => {
      await expect(register.execute({ email: 'bob@example.com', password: 'weak', username: 'bob' })).rejects.toThrow(
        ValidationError,
      );
    });

    it('should still register when the welcome email fails', async () => {
      jest.spyOn(mail, 'sendRegistrationEmail').mockRejectedValue(new Error('smtp down'));
      const id = await register.execute({ email: 'carol@example.com', password, username: 'carol' });
      expect(typeof id).toBe('string');
    });
  });

  describe('LoginInteractor', () => {
    let userId: string;

    beforeEach(async () => {
      userId = await register.execute({ email: 'alice@example.com', password, username: 'alice' });
    });

    it('should issue a bearer token for the user', async () => {
      const token = await login.execute({ email: 'alice@example.com', password });
      expect(token.tokenType).toBe('bearer');
      expect(token.expiresIn).toBe(1800);
      expect(tokens.verify(token.accessToken)).toBe(userId);
    });

    it('should reject a wrong password', async () => {
      await expect(login.execute({ email: 'alice@example.com', password: 'Wr0ng!pass' })).rejects.toThrow(
        InvalidCredentialsError,
      );
    });

    it('should reject an unknown email with the same error', async () => {
      await expect(login.execute({ email: 'nobody@example.com', password })).rejects.toThrow('Invalid credentials');
    });

    it('should reject an inactive user', async () => {
      await db.updateTable('users').set({ is_active: 0 }).where('id', '=', userId).execute();
      await expect(login.execute({ email: 'alice@example.com', password })).rejects.toThrow(InvalidCredentialsError);
    });

    it('should throttle repeated attempts from the same client', async () => {
      const attempt = { email: 'alice@example.com', password: 'Wr0ng!pass', clientKey: '10.0.0.1' };
      for (let i = 0; i < 3; i++) {
        await expect(login.execute(attempt)).rejects.toThrow(InvalidCredentialsError);
      }
      await expect(login.execute({ ...attempt, password })).rejects.toThrow(TooManyRequestsError);
      // Another client is unaffected
      await expect(login.execute({ ...attempt, password, clientKey: '10.0.0.2' })).resolves.toMatchObject({
        tokenType: 'bearer',
      });
    });
  });

  describe('password reset', () => {
    beforeEach(async () => {
      await register.execute({ email: 'alice@example.com', password, username: 'alice' });
    });

    it('should do nothing visible for an unknown email', async () => {
      await expect(requestReset.execute('nobody@example.com')).resolves.toBeUndefined();
      expect(mail.resets).toEqual([]);
    });

    it('should resolve for a known email even when the reset email fails', async () => {
      jest.spyOn(mail, 'sendPasswordResetEmail').mockRejectedValue(new Error('smtp down'));

      await expect(requestReset.execute('alice@example.com')).resolves.toBeUndefined();
      await expect(requestReset.execute('nobody@example.com')).resolves.toBeUndefined();

      const stored = await db.selectFrom('password_reset_tokens').select('user_id').execute();
      expect(stored).toHaveLength(1);
    });

    it('should email a token that changes the password once', async () => {
      await requestReset.execute('alice@example.com');
      expect(mail.resets).toHaveLength(1);
      const { token } = mail.resets[0];

      await resetPassword.execute({ token, newPassword: 'N3w!password' });

      await expect(login.execute({ email: 'alice@example.com', password })).rejects.toThrow(InvalidCredentialsError);
      await expect(login.execute({ email: 'alice@example.com', password: 'N3w!password' })).resolves.toMatchObject({
        tokenType: 'bearer',
      });
      await expect(resetPassword.execute({ token, newPassword: 'An0ther!pass' })).rejects.toThrow(ExpiredTokenError);
    });

    it('should reject an unknown token', async () => {
      await expect(resetPassword.execute({ token: 'unknown', newPassword: 'N3w!password' })).rejects.toThrow(
        ExpiredTokenError,
      );
    });

    it('should reject an expired token', async () => {
      await requestReset.execute('alice@example.com');
      const { token } = mail.resets[0];
      await db
        .updateTable('password_reset_tokens')
        .set({ expires_at: '2000-01-01T00:00:00.000Z' })
        .where('token', '=', token)
        .execute();

      await expect(resetPassword.execute({ token, newPassword: 'N3w!password' })).rejects.toThrow('Token has expired');
    });
  });
});
