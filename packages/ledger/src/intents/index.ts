/**
 * Intents Module
 */

// Type-only exports
export type { SignatureParts } from './hashing.js';
export type { IntentVerifier } from './verifier.js';
export type { SignedIntent } from './signer.js';

// Value exports
export {
  PURCHASE_INTENT_TYPES,
  REDEEM_INTENT_TYPES,
  TRANSFER_REQUEST_TYPES,
  REFUND_REQUEST_TYPES,
  encodePurchaseIntent,
  encodeRedeemIntent,
  encodeTransferRequest,
  encodeRefundRequest,
  hashPurchaseIntent,
  hashRedeemIntent,
  hashTransferRequest,
  hashRefundRequest,
  hashBridgePayload,
  toSignedMessageHash,
  splitSignature,
  recoverIntentSigner,
} from './hashing.js';
export { EcdsaIntentVerifier, assertSignedBy } from './verifier.js';
export { IntentSigner } from './signer.js';
