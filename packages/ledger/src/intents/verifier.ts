/**
 * Intent Verifier
 *
 * Signature-based authorization stands in for caller identity on relayed
 * calls. The ledger only needs "recover an account from (digest, signature)",
 * so the algorithm is a pluggable capability.
 */

import { getAddress, isAddress } from 'ethers';
import { AuthorizationError } from '../boundaries/errors.js';
import { recoverIntentSigner } from './hashing.js';

export interface IntentVerifier {
  /**
   * Recover the account that authorized `digest`.
   * Throws AuthorizationError when the signature is unusable.
   */
  recover(digest: string, signature: string): string;
}

/**
 * secp256k1 ECDSA over EIP-191 personal messages.
 */
export class EcdsaIntentVerifier implements IntentVerifier {
  recover(digest: string, signature: string): string {
    return recoverIntentSigner(digest, signature);
  }
}

/**
 * Require `signature` over `digest` to come from exactly `account`.
 */
export function assertSignedBy(
  verifier: IntentVerifier,
  digest: string,
  signature: string,
  account: string,
): void {
  const recovered = verifier.recover(digest, signature);
  if (!isAddress(recovered) || getAddress(recovered) !== getAddress(account)) {
    throw new AuthorizationError(
      'INVALID_SIGNATURE',
      `intent signed by ${recovered}, expected ${account}`,
    );
  }
}
