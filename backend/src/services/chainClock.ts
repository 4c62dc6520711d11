import { randomBytes } from 'crypto';
import { assertProduced, entropyForBlock, type Chain, type Hex } from '../../../contracts/src';

export interface WallClockChainOptions {
  blockTimeMs: number;
  genesisMs?: number;
  salt?: string;
  clock?: () => number;
}

/**
 * Block height derived from elapsed wall-clock time. The entropy salt is drawn
 * once per process, so block entropy cannot be computed ahead of time by callers.
 */
export class WallClockChain implements Chain {
  private readonly clock: () => number;
  private readonly genesisMs: number;
  private readonly salt: string;

  constructor(private readonly options: WallClockChainOptions) {
    if (options.blockTimeMs <= 0) {
      throw new RangeError('blockTimeMs must be positive');
    }
    this.clock = options.clock ?? Date.now;
    this.genesisMs = options.genesisMs ?? this.clock();
    this.salt = options.salt ?? randomBytes(32).toString('hex');
  }

  now() {
    return Math.floor(this.clock() / 1000);
  }

  blockNumber() {
    return Math.floor((this.clock() - this.genesisMs) / this.options.blockTimeMs);
  }

  blockEntropy(height: number): Hex {
    assertProduced(this, height);
    return entropyForBlock(this.salt, height);
  }
}
