/**
 * Intent Hashing
 *
 * Builds the exact digest a user signs for purchase, redeem, transfer and
 * refund requests and recovers the signer from a 65-byte signature.
 *
 * Layout: ABI-encoded fixed-width fields, keccak256'd, then wrapped in the
 * EIP-191 personal-message prefix before recovery. The redeem intent signs
 * keccak256(bridgePayload) so the signed message stays fixed-size no matter
 * how large the bridge instructions are.
 *
 * Each layout encodes to a different length (purchase carries a dynamic
 * string, the others 8, 5 and 3 static words), so a digest signed for one
 * kind of request never verifies as another.
 */

import {
  AbiCoder,
  Signature,
  getBytes,
  hashMessage,
  hexlify,
  isHexString,
  keccak256,
  recoverAddress,
} from 'ethers';
import { AuthorizationError, LedgerValidationError } from '../boundaries/errors.js';
import type { PurchaseIntent, RedeemIntent, RefundRequest, TransferRequest } from '../ledger/types.js';

const coder = AbiCoder.defaultAbiCoder();

export const PURCHASE_INTENT_TYPES = [
  'address', // account
  'uint256', // amount
  'string',  // targetChain
  'uint256', // expiryDays
  'uint256', // priceGwei
  'uint256', // nativePriceUsdc
  'uint256', // timestamp
] as const;

export const REDEEM_INTENT_TYPES = [
  'address', // account
  'uint256', // creditId
  'uint256', // unitsToUse
  'uint256', // currentPriceGwei
  'uint256', // nativePriceUsdc
  'uint256', // timestamp
  'bytes32', // keccak256(bridgePayload)
  'bool',    // cashSettlement
] as const;

export const TRANSFER_REQUEST_TYPES = [
  'address', // account
  'uint256', // creditId
  'address', // recipient
  'uint256', // units
  'uint256', // timestamp
] as const;

export const REFUND_REQUEST_TYPES = [
  'address', // account
  'uint256', // creditId
  'uint256', // timestamp
] as const;

export interface SignatureParts {
  r: string;
  s: string;
  v: 27 | 28;
}

// =============================================================================
// DIGESTS
// =============================================================================

export function encodePurchaseIntent(intent: PurchaseIntent): string {
  return coder.encode(PURCHASE_INTENT_TYPES, [
    intent.account,
    intent.amount,
    intent.targetChain,
    intent.expiryDays,
    intent.priceGwei,
    intent.nativePriceUsdc,
    intent.timestamp,
  ]);
}

export function hashPurchaseIntent(intent: PurchaseIntent): string {
  return keccak256(encodePurchaseIntent(intent));
}

export function hashBridgePayload(payload: string): string {
  if (!isHexString(payload)) {
    throw new LedgerValidationError('INVALID_PAYLOAD', 'bridge payload must be 0x-prefixed hex');
  }
  return keccak256(payload);
}

export function encodeRedeemIntent(intent: RedeemIntent): string {
  return coder.encode(REDEEM_INTENT_TYPES, [
    intent.account,
    intent.creditId,
    intent.unitsToUse,
    intent.currentPriceGwei,
    intent.nativePriceUsdc,
    intent.timestamp,
    hashBridgePayload(intent.bridgePayload),
    intent.cashSettlement,
  ]);
}

export function hashRedeemIntent(intent: RedeemIntent): string {
  return keccak256(encodeRedeemIntent(intent));
}

export function encodeTransferRequest(request: TransferRequest): string {
  return coder.encode(TRANSFER_REQUEST_TYPES, [
    request.account,
    request.creditId,
    request.recipient,
    request.units,
    request.timestamp,
  ]);
}

export function hashTransferRequest(request: TransferRequest): string {
  return keccak256(encodeTransferRequest(request));
}

export function encodeRefundRequest(request: RefundRequest): string {
  return coder.encode(REFUND_REQUEST_TYPES, [request.account, request.creditId, request.timestamp]);
}

export function hashRefundRequest(request: RefundRequest): string {
  return keccak256(encodeRefundRequest(request));
}

/**
 * The hash actually signed: "\x19Ethereum Signed Message:\n32" ‖ digest.
 */
export function toSignedMessageHash(digest: string): string {
  return hashMessage(getBytes(digest));
}

// =============================================================================
// SIGNATURES
// =============================================================================

/**
 * Split a 65-byte signature into r, s and a recovery id in {27, 28}.
 */
export function splitSignature(signature: string): SignatureParts {
  if (!isHexString(signature, 65)) {
    throw new AuthorizationError('INVALID_SIGNATURE', 'signature must be 65 bytes of hex');
  }

  const bytes = getBytes(signature);
  const raw = bytes[64] < 27 ? bytes[64] + 27 : bytes[64];
  const v = raw === 27 ? 27 : raw === 28 ? 28 : null;
  if (v === null) {
    throw new AuthorizationError('INVALID_SIGNATURE', `invalid recovery id ${bytes[64]}`);
  }

  return {
    r: hexlify(bytes.slice(0, 32)),
    s: hexlify(bytes.slice(32, 64)),
    v,
  };
}

/**
 * Recover the account that signed `digest` under the personal-message prefix.
 */
export function recoverIntentSigner(digest: string, signature: string): string {
  const parts = splitSignature(signature);
  try {
    return recoverAddress(toSignedMessageHash(digest), Signature.from(parts));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AuthorizationError('INVALID_SIGNATURE', `signature recovery failed: ${reason}`);
  }
}
