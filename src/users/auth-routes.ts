import { FastifyInstance } from 'fastify';

import { createParser } from '../http/validation';
import type {
  LoginInteractor,
  RegisterUserInteractor,
  RequestPasswordResetInteractor,
  ResetPasswordInteractor,
} from './auth-interactors';
import type { RegisterUserInput, ResetPasswordInput } from './types';

export interface AuthRouteDeps {
  register: RegisterUserInteractor;
  login: LoginInteractor;
  requestPasswordReset: RequestPasswordResetInteractor;
  resetPassword: ResetPasswordInteractor;
}

const parseRegister = createParser<RegisterUserInput>({
  type: 'object',
  properties: {
    email: { type: 'string', minLength: 1 },
    password: { type: 'string', minLength: 1 },
    username: { type: 'string', minLength: 1, maxLength: 50 },
  },
  required: ['email', 'password', 'username'],
  additionalProperties: false,
});

interface Credentials {
  email: string;
  password: string;
}

const parseLogin = createParser<Credentials>({
  type: 'object',
  properties: {
    email: { type: 'string', minLength: 1 },
    password: { type: 'string', minLength: 1 },
  },
  required: ['email', 'password'],
  additionalProperties: false,
});

const parseResetRequest = createParser<{ email: string }>({
  type: 'object',
  properties: { email: { type: 'string', minLength: 1 } },
  required: ['email'],
  additionalProperties: false,
});

const parseResetConfirm = createParser<ResetPasswordInput>({
  type: 'object',
  properties: {
    token: { type: 'string', minLength: 1 },
    newPassword: { type: 'string', minLength: 1 },
  },
  required: ['token', 'newPassword'],
  additionalProperties: false,
});

export function registerAuthRoutes(app: FastifyInstance, deps: AuthRouteDeps): void {
  app.post('/auth/register', async (req, reply) => {
    const id = await deps.register.execute(parseRegister(req.body));
    return reply.status(201).send({ id });
  });

  app.post('/auth/login', async (req, reply) => {
    const credentials = parseLogin(req.body);
    const token = await deps.login.execute({ ...credentials, clientKey: req.ip });
    return reply.send(token);
  });

  /** Always 202, whether or not the address is registered */
  app.post('/auth/password-reset/request', async (req, reply) => {
    const { email } = parseResetRequest(req.body);
    await deps.requestPasswordReset.execute(email);
    return reply.status(202).send({ status: 'accepted' });
  });

  app.post('/auth/password-reset/confirm', async (req, reply) => {
    await deps.resetPassword.execute(parseResetConfirm(req.body));
    return reply.send({ status: 'ok' });
  });
}
