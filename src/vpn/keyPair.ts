import nacl from 'tweetnacl';
import { KeyPair } from '../types/index.js';

/**
 * WireGuard keys are Curve25519:
 * - privateKey: 32 random bytes, clamped the way `wg genkey` does
 * - publicKey:  scalarMultBase(privateKey)
 */
export function generateKeyPair(): KeyPair {
  const privateKey = nacl.randomBytes(32);
  privateKey[0] &= 248;
  privateKey[31] = (privateKey[31] & 127) | 64;

  return {
    privateKey,
    publicKey: nacl.scalarMult.base(privateKey),
  };
}

/**
 * Public key for an existing private key (`wg pubkey`)
 */
export function derivePublicKey(privateKey: Uint8Array): Uint8Array {
  return nacl.scalarMult.base(privateKey);
}

export function toBase64(key: Uint8Array): string {
  return Buffer.from(key).toString('base64');
}

/**
 * WireGuard key = base64(32 bytes) => 44 chars ending in "="
 */
export const WG_KEY_RE = /^[A-Za-z0-9+/]{43}=$/;

/**
 * Overwrite the private key once it is no longer needed (best-effort)
 */
export function discardKeyPair(keyPair: KeyPair): void {
  keyPair.privateKey.fill(0);
}
