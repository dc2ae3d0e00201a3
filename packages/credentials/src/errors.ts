import {z} from 'zod';

export const credentialErrorCodeSchema = z.enum([
  'invalid_input',
  'public_key_invalid',
  'password_encryption_failed',
  'upstream_unreachable',
  'login_failed',
  'login_rejected',
  'register_failed',
  'token_missing'
]);

export type CredentialErrorCode = z.infer<typeof credentialErrorCodeSchema>;

export type CredentialError = {
  code: CredentialErrorCode;
  message: string;
};

export type CredentialSuccess<T> = {
  ok: true;
  value: T;
};

export type CredentialFailure = {
  ok: false;
  error: CredentialError;
};

export type CredentialResult<T> = CredentialSuccess<T> | CredentialFailure;

export const ok = <T>(value: T): CredentialSuccess<T> => ({ok: true, value});

export const err = (code: CredentialErrorCode, message: string): CredentialFailure => ({
  ok: false,
  error: {code, message}
});
