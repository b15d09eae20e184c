export class AuthError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'AuthError';
  }
}

export class InvalidCredentialsError extends AuthError {
  constructor(message = 'invalid email or password') {
    super(message, 'INVALID_CREDENTIALS');
    this.name = 'InvalidCredentialsError';
  }
}

export class AccountInactiveError extends AuthError {
  constructor(message = 'account is inactive') {
    super(message, 'ACCOUNT_INACTIVE');
    this.name = 'AccountInactiveError';
  }
}

export class AccountLockedError extends AuthError {
  constructor(message = 'account temporarily locked after repeated failed attempts') {
    super(message, 'ACCOUNT_LOCKED');
    this.name = 'AccountLockedError';
  }
}

export class TokenExpiredError extends AuthError {
  constructor(message = 'token expired') {
    super(message, 'TOKEN_EXPIRED');
    this.name = 'TokenExpiredError';
  }
}

export class TokenInvalidSignatureError extends AuthError {
  constructor(message = 'invalid token') {
    super(message, 'TOKEN_INVALID_SIGNATURE');
    this.name = 'TokenInvalidSignatureError';
  }
}

export class TokenTypeMismatchError extends AuthError {
  constructor(message = 'unexpected token type') {
    super(message, 'TOKEN_TYPE_MISMATCH');
    this.name = 'TokenTypeMismatchError';
  }
}

export class TokenRevokedError extends AuthError {
  constructor(message = 'token revoked') {
    super(message, 'TOKEN_REVOKED');
    this.name = 'TokenRevokedError';
  }
}

export class MfaRequiredError extends AuthError {
  constructor(message = 'multi-factor authentication required') {
    super(message, 'MFA_REQUIRED');
    this.name = 'MfaRequiredError';
  }
}

export class MfaCodeInvalidError extends AuthError {
  constructor(message = 'invalid verification code') {
    super(message, 'MFA_CODE_INVALID');
    this.name = 'MfaCodeInvalidError';
  }
}

export class MfaCodeExpiredError extends AuthError {
  constructor(message = 'verification code expired') {
    super(message, 'MFA_CODE_EXPIRED');
    this.name = 'MfaCodeExpiredError';
  }
}

export class RefreshTokenReusedError extends AuthError {
  constructor(message = 'refresh token reused') {
    super(message, 'REFRESH_TOKEN_REUSED');
    this.name = 'RefreshTokenReusedError';
  }
}

export class StoreUnavailableError extends AuthError {
  constructor(message = 'backing store unavailable', public readonly reason?: unknown) {
    super(message, 'STORE_UNAVAILABLE');
    this.name = 'StoreUnavailableError';
  }
}

export class AccountExistsError extends AuthError {
  constructor(message = 'email is already registered') {
    super(message, 'ACCOUNT_EXISTS');
    this.name = 'AccountExistsError';
  }
}

export class EmailNotVerifiedError extends AuthError {
  constructor(message = 'email is not verified') {
    super(message, 'EMAIL_NOT_VERIFIED');
    this.name = 'EmailNotVerifiedError';
  }
}

export class ForbiddenError extends AuthError {
  constructor(message = 'forbidden') {
    super(message, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends AuthError {
  constructor(message = 'resource not found') {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class RateLimitedError extends AuthError {
  constructor(public readonly retryAfterSeconds: number, message = 'too many requests') {
    super(message, 'RATE_LIMITED');
    this.name = 'RateLimitedError';
  }
}
