export interface User {
  id: string;
  email: string;
  username: string;
  passwordHash: string;
  isActive: boolean;
  createdAt: string;
}

export interface PasswordResetToken {
  id: string;
  userId: string;
  token: string;
  expiresAt: string;
  used: boolean;
  createdAt: string;
}

export interface RegisterUserInput {
  email: string;
  password: string;
  username: string;
}

export interface LoginInput {
  email: string;
  password: string;
  /** Client address, used for login throttling */
  clientKey?: string;
}

export interface ResetPasswordInput {
  token: string;
  newPassword: string;
}

export interface AccessToken {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
}

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}

export interface TokenService {
  issue(subject: string): AccessToken;
  /** Returns the subject (user id) of a valid token */
  verify(token: string): string;
}
