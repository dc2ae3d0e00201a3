import {z} from 'zod';

export const DEFAULT_EXPIRY_WINDOW_MS = 24 * 60 * 60 * 1000;

export const CredentialConfigSchema = z
  .object({
    identity: z.string().trim().min(1),
    password: z.string().min(1),
    nickname: z.string().trim().min(1).default('service'),
    public_key_pem: z.string().min(1),
    login_path: z.string().trim().min(1).default('/v1/user/login'),
    register_path: z.string().trim().min(1).default('/v1/user/register'),
    expiry_window_ms: z.number().int().positive().default(DEFAULT_EXPIRY_WINDOW_MS)
  })
  .strict();

export type CredentialConfigInput = z.input<typeof CredentialConfigSchema>;
export type CredentialConfig = z.infer<typeof CredentialConfigSchema>;

export const CredentialRecordSchema = z
  .object({
    identity: z.string().min(1),
    token: z.string().min(1),
    refreshed_at: z.iso.datetime()
  })
  .strict();

export type CredentialRecord = z.infer<typeof CredentialRecordSchema>;

export type CredentialState = 'no_token' | 'authenticating' | 'valid' | 'expired' | 'reauthenticating' | 'failed';

/** Status and body of an upstream reply, enough to tell whether the token was refused. */
export type ReplySummary = {
  status: number;
  body?: Uint8Array;
};
