import { unauthorized } from './errors';

export interface TreasuryConfig {
  foundation: string;
  operations: string;
  operator: string;
}

export class Treasury {
  private foundationAddress: string;
  readonly operations: string;
  readonly operator: string;

  constructor(config: TreasuryConfig) {
    this.foundationAddress = config.foundation;
    this.operations = config.operations;
    this.operator = config.operator;
  }

  get foundation() {
    return this.foundationAddress;
  }

  /** Returns the address that was replaced. */
  setFoundation(sender: string, foundation: string): string {
    if (sender !== this.operator) {
      throw unauthorized(sender, 'operator');
    }
    if (!foundation.trim()) {
      throw new TypeError('foundation address must not be empty');
    }
    const previous = this.foundationAddress;
    this.foundationAddress = foundation;
    return previous;
  }
}
