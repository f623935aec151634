/**
 * Ed25519 signatures over typed payloads
 *
 * Signature format: `ed25519:<spki public key, base64url>:<signature, base64url>`.
 * The signer's identity is derived from the embedded public key, so recovery
 * needs no key directory: a signature that verifies names its signer.
 */

import type { KeyObject } from 'crypto';
import { createPublicKey, generateKeyPairSync, sign, verify } from 'crypto';
import type { Identity } from '../identity/address.js';
import type { PayloadSigner, SignatureVerifier, TypedPayload } from './typed-data.js';
import { identityFromKey } from '../identity/address.js';
import { hashTypedPayload } from './typed-data.js';

const SIGNATURE_PREFIX = 'ed25519';

export class Ed25519SignatureVerifier implements SignatureVerifier {
  recover(payload: TypedPayload, signature: string): Identity | null {
    const parts = signature.split(':');
    if (parts.length !== 3 || parts[0] !== SIGNATURE_PREFIX) {
      return null;
    }

    const [, encodedKey = '', encodedSignature = ''] = parts;
    const keyBytes = Buffer.from(encodedKey, 'base64url');
    const signatureBytes = Buffer.from(encodedSignature, 'base64url');

    try {
      const publicKey = createPublicKey({ key: keyBytes, format: 'der', type: 'spki' });
      if (publicKey.asymmetricKeyType !== 'ed25519') {
        return null;
      }
      const valid = verify(null, hashTypedPayload(payload), publicKey, signatureBytes);
      return valid ? identityFromKey(keyBytes) : null;
    } catch {
      // undecodable key or signature bytes
      return null;
    }
  }
}

export class Ed25519Signer implements PayloadSigner {
  readonly identity: Identity;
  private readonly encodedKey: string;

  constructor(private readonly privateKey: KeyObject) {
    const publicKey = createPublicKey(privateKey).export({ format: 'der', type: 'spki' });
    this.identity = identityFromKey(publicKey);
    this.encodedKey = publicKey.toString('base64url');
  }

  /**
   * Fresh random key pair
   */
  static generate(): Ed25519Signer {
    const { privateKey } = generateKeyPairSync('ed25519');
    return new Ed25519Signer(privateKey);
  }

  sign(payload: TypedPayload): string {
    const signature = sign(null, hashTypedPayload(payload), this.privateKey);
    return `${SIGNATURE_PREFIX}:${this.encodedKey}:${signature.toString('base64url')}`;
  }
}

export function createEd25519Verifier(): SignatureVerifier {
  return new Ed25519SignatureVerifier();
}
