import { operationInProgress } from "./errors";

/**
 * Single-holder lock for instance-affecting work. A second caller is turned
 * away immediately instead of waiting behind the current holder.
 */
export class OperationGate {
  private holder: string | null = null;

  get busy(): boolean {
    return this.holder !== null;
  }

  get currentOperation(): string | null {
    return this.holder;
  }

  async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    if (this.holder !== null) {
      throw operationInProgress(this.holder);
    }
    this.holder = operation;
    try {
      return await task();
    } finally {
      this.holder = null;
    }
  }
}
