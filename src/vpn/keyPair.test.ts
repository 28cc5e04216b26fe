import { describe, it, expect } from 'vitest';
import { WG_KEY_RE, derivePublicKey, discardKeyPair, generateKeyPair, toBase64 } from './keyPair.js';

describe('generateKeyPair', () => {
  it('produces a clamped Curve25519 private key', () => {
    const { privateKey } = generateKeyPair();

    expect(privateKey).toHaveLength(32);
    expect(privateKey[0] & 7).toBe(0);
    expect(privateKey[31] & 128).toBe(0);
    expect(privateKey[31] & 64).toBe(64);
  });

  it('derives the public key from the private key', () => {
    const keyPair = generateKeyPair();
    expect(toBase64(derivePublicKey(keyPair.privateKey))).toBe(toBase64(keyPair.publicKey));
  });

  it('encodes keys in WireGuard form', () => {
    const keyPair = generateKeyPair();
    expect(toBase64(keyPair.privateKey)).toMatch(WG_KEY_RE);
    expect(toBase64(keyPair.publicKey)).toMatch(WG_KEY_RE);
  });
});

describe('discardKeyPair', () => {
  it('overwrites the private key', () => {
    const keyPair = generateKeyPair();
    const publicKey = toBase64(keyPair.publicKey);

    discardKeyPair(keyPair);

    expect(Array.from(keyPair.privateKey)).toEqual(new Array(32).fill(0));
    expect(toBase64(keyPair.publicKey)).toBe(publicKey);
  });
});
