import { MarketError } from './errors';

export class ExecutionGuard {
  private locked = false;

  get active() {
    return this.locked;
  }

  run<T>(operation: string, body: () => T): T {
    if (this.locked) {
      throw new MarketError('Reentrancy', `re-entered ${operation} while another operation is executing`, {
        operation
      });
    }
    this.locked = true;
    try {
      return body();
    } finally {
      this.locked = false;
    }
  }
}
