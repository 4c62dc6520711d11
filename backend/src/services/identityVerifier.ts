import { createHmac, timingSafeEqual } from 'crypto';
import {
  verificationRequestFor,
  type IdentityProof,
  type IdentityScope,
  type IdentityVerifier,
  type VerificationRequest
} from '../../../contracts/src';

export interface AttestationVerifierOptions {
  secret: string;
  roots: bigint[];
}

/**
 * Accepts identity proofs issued by the attestation service: the proof is an
 * HMAC over every public input, so a proof made for one wallet, scope or
 * nullifier does not verify for another.
 */
export const attestationFor = (secret: string, request: Omit<VerificationRequest, 'proof'>) =>
  createHmac('sha256', secret)
    .update(
      [request.root, request.groupId, request.signalHash, request.nullifierHash, request.externalNullifierHash]
        .map((value) => value.toString(16))
        .join(':')
    )
    .digest('hex');

/** Issues the proof a wallet presents when entering under `scope`. */
export const issueAttestation = (
  secret: string,
  scope: IdentityScope,
  wallet: string,
  identity: Omit<IdentityProof, 'proof'>
): IdentityProof => ({
  ...identity,
  proof: attestationFor(secret, verificationRequestFor(scope, wallet, { ...identity, proof: '' }))
});

export class AttestationVerifier implements IdentityVerifier {
  private readonly roots: Set<bigint>;

  constructor(private readonly options: AttestationVerifierOptions) {
    this.roots = new Set(options.roots);
  }

  verify(request: VerificationRequest) {
    if (!this.roots.has(request.root)) {
      throw new Error(`unknown identity root ${request.root.toString(16)}`);
    }
    const expected = Buffer.from(attestationFor(this.options.secret, request));
    const provided = Buffer.from(request.proof);
    if (expected.length !== provided.length || !timingSafeEqual(expected, provided)) {
      throw new Error('identity attestation does not match its public inputs');
    }
  }
}
