import { createHash } from 'crypto';
import type { Hex } from './types';

const UINT256_MAX = (1n << 256n) - 1n;
const BYTES32_PATTERN = /^0x[0-9a-fA-F]{64}$/;

export const isBytes32 = (value: string): value is Hex => BYTES32_PATTERN.test(value);

export const isUint256 = (value: bigint) => value >= 0n && value <= UINT256_MAX;

export const uint256 = (value: bigint): Buffer => {
  if (!isUint256(value)) {
    throw new RangeError(`value does not fit in uint256: ${value}`);
  }
  return Buffer.from(value.toString(16).padStart(64, '0'), 'hex');
};

export const bytes32 = (value: string): Buffer => {
  if (!isBytes32(value)) {
    throw new TypeError(`expected 0x-prefixed 32-byte hex, got ${value}`);
  }
  return Buffer.from(value.slice(2), 'hex');
};

export const utf8 = (value: string): Buffer => Buffer.from(value, 'utf8');

export const toHex = (digest: Buffer): Hex => `0x${digest.toString('hex')}`;

export const hexToBigInt = (value: Hex): bigint => BigInt(value);

export const sha256 = (...parts: Buffer[]): Hex => {
  const hash = createHash('sha256');
  parts.forEach((part) => hash.update(part));
  return toHex(hash.digest());
};

/** Digest shifted into the scalar field the identity verifier works in. */
export const hashToField = (...parts: Buffer[]): bigint => hexToBigInt(sha256(...parts)) >> 8n;
