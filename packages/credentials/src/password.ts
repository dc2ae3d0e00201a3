import {constants, createPublicKey, publicEncrypt, type KeyObject} from 'node:crypto';

import {err, ok, type CredentialResult} from './errors';

export const parsePublicKey = (pem: string): CredentialResult<KeyObject> => {
  try {
    const key = createPublicKey(pem);
    if (key.asymmetricKeyType !== 'rsa') {
      return err('public_key_invalid', `Expected an RSA public key, got ${String(key.asymmetricKeyType)}`);
    }

    return ok(key);
  } catch {
    return err('public_key_invalid', 'Public key is not a valid PEM encoded key');
  }
};

/**
 * Produces the login password field: the UTF-8 password is base64 encoded,
 * encrypted with RSA PKCS#1 v1.5 and base64 encoded again. Padding is random,
 * so two calls never return the same value.
 */
export const encryptPassword = ({password, publicKey}: {password: string; publicKey: KeyObject}): CredentialResult<string> => {
  const encoded = Buffer.from(Buffer.from(password, 'utf8').toString('base64'), 'utf8');

  try {
    const encrypted = publicEncrypt({key: publicKey, padding: constants.RSA_PKCS1_PADDING}, encoded);
    return ok(encrypted.toString('base64'));
  } catch (error) {
    return err(
      'password_encryption_failed',
      error instanceof Error ? error.message : 'Password could not be encrypted'
    );
  }
};
