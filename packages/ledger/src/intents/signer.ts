/**
 * Intent Signer
 *
 * Client-side counterpart of the verifier: wallets and relayer tooling use
 * it to produce signatures the ledger accepts.
 */

import { getBytes, type Signer } from 'ethers';
import type { PurchaseIntent, RedeemIntent, RefundRequest, TransferRequest } from '../ledger/types.js';
import { hashPurchaseIntent, hashRedeemIntent, hashRefundRequest, hashTransferRequest } from './hashing.js';

export interface SignedIntent<T> {
  intent: T;
  digest: string;
  signature: string;
}

export class IntentSigner {
  constructor(private readonly signer: Signer) {}

  async address(): Promise<string> {
    return this.signer.getAddress();
  }

  async signPurchase(intent: PurchaseIntent): Promise<SignedIntent<PurchaseIntent>> {
    const digest = hashPurchaseIntent(intent);
    return { intent, digest, signature: await this.signDigest(digest) };
  }

  async signRedeem(intent: RedeemIntent): Promise<SignedIntent<RedeemIntent>> {
    const digest = hashRedeemIntent(intent);
    return { intent, digest, signature: await this.signDigest(digest) };
  }

  async signTransfer(request: TransferRequest): Promise<SignedIntent<TransferRequest>> {
    const digest = hashTransferRequest(request);
    return { intent: request, digest, signature: await this.signDigest(digest) };
  }

  async signRefund(request: RefundRequest): Promise<SignedIntent<RefundRequest>> {
    const digest = hashRefundRequest(request);
    return { intent: request, digest, signature: await this.signDigest(digest) };
  }

  /** Personal-message signature over the raw 32-byte digest. */
  async signDigest(digest: string): Promise<string> {
    return this.signer.signMessage(getBytes(digest));
  }
}
