import {generateKeyPairSync} from 'node:crypto';

import {describe, expect, it} from 'vitest';

import {encryptPassword, parsePublicKey} from '../index';
import {decryptPasswordField, testKeyPair} from './keys';

describe('encryptPassword', () => {
  it('encrypts the base64 encoded password under PKCS#1 v1.5', () => {
    const publicKey = parsePublicKey(testKeyPair.publicKey);
    expect(publicKey.ok).toBe(true);
    if (!publicKey.ok) {
      return;
    }

    const encrypted = encryptPassword({password: 'test-password', publicKey: publicKey.value});
    expect(encrypted.ok).toBe(true);
    if (!encrypted.ok) {
      return;
    }

    expect(Buffer.from(encrypted.value, 'base64')).toHaveLength(256);
    expect(decryptPasswordField(encrypted.value)).toBe('test-password');
  });

  it('produces a fresh ciphertext on every call', () => {
    const publicKey = parsePublicKey(testKeyPair.publicKey);
    if (!publicKey.ok) {
      throw new Error('expected a valid key');
    }

    const first = encryptPassword({password: 'test-password', publicKey: publicKey.value});
    const second = encryptPassword({password: 'test-password', publicKey: publicKey.value});

    expect(first.ok && second.ok && first.value !== second.value).toBe(true);
  });

  it('keeps non-ASCII passwords intact', () => {
    const publicKey = parsePublicKey(testKeyPair.publicKey);
    if (!publicKey.ok) {
      throw new Error('expected a valid key');
    }

    const encrypted = encryptPassword({password: 'pässwört-✓', publicKey: publicKey.value});
    expect(encrypted.ok && decryptPasswordField(encrypted.value)).toBe('pässwört-✓');
  });
});

describe('parsePublicKey', () => {
  it('rejects text that is not a key', () => {
    expect(parsePublicKey('not a key')).toEqual({
      ok: false,
      error: {code: 'public_key_invalid', message: 'Public key is not a valid PEM encoded key'}
    });
  });

  it('rejects non-RSA keys', () => {
    const {publicKey} = generateKeyPairSync('ed25519', {
      publicKeyEncoding: {type: 'spki', format: 'pem'},
      privateKeyEncoding: {type: 'pkcs8', format: 'pem'}
    });

    expect(parsePublicKey(publicKey)).toEqual({
      ok: false,
      error: {code: 'public_key_invalid', message: 'Expected an RSA public key, got ed25519'}
    });
  });
});
