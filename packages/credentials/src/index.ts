export {
  CredentialConfigSchema,
  CredentialRecordSchema,
  DEFAULT_EXPIRY_WINDOW_MS,
  type CredentialConfig,
  type CredentialConfigInput,
  type CredentialRecord,
  type CredentialState,
  type ReplySummary
} from './contracts';
export {
  credentialErrorCodeSchema,
  err,
  ok,
  type CredentialError,
  type CredentialErrorCode,
  type CredentialFailure,
  type CredentialResult,
  type CredentialSuccess
} from './errors';
export {
  createCredentialManager,
  isTokenRejected,
  type CreateCredentialManagerInput,
  type CredentialManager
} from './manager';
export {encryptPassword, parsePublicKey} from './password';
export {createFileCredentialStore, createInMemoryCredentialStore, type CredentialStore} from './store';
