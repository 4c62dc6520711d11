import { sha256, uint256, utf8 } from './hashing';
import type { Hex } from './types';

/**
 * Time and block source. `blockEntropy` is only defined for blocks that have
 * already been produced.
 */
export interface Chain {
  now(): number;
  blockNumber(): number;
  blockEntropy(height: number): Hex;
}

export const entropyForBlock = (salt: string, height: number): Hex => sha256(utf8(salt), uint256(BigInt(height)));

export const assertProduced = (chain: Chain, height: number) => {
  const current = chain.blockNumber();
  if (height > current) {
    throw new RangeError(`block ${height} has not been produced (current ${current})`);
  }
};

export interface ManualChainOptions {
  startTime?: number;
  startBlock?: number;
  salt?: string;
}

/** Deterministic chain that only moves when told to. */
export class ManualChain implements Chain {
  private time: number;
  private height: number;
  private readonly salt: string;

  constructor(options: ManualChainOptions = {}) {
    this.time = options.startTime ?? 1_700_000_000;
    this.height = options.startBlock ?? 1;
    this.salt = options.salt ?? 'manual-chain';
  }

  now() {
    return this.time;
  }

  blockNumber() {
    return this.height;
  }

  blockEntropy(height: number): Hex {
    assertProduced(this, height);
    return entropyForBlock(this.salt, height);
  }

  advanceTime(seconds: number) {
    this.time += seconds;
  }

  mineBlocks(count: number) {
    this.height += count;
  }
}
