/**
 * Unit of Work
 *
 * Groups the writes of one action. Stores stage their puts and deletes
 * while a unit is open; the unit commits them together when the action
 * returns, or discards them all when it throws. Nested runs join the
 * enclosing unit, so a component calling another component mid-action
 * shares its atomic scope.
 */

export interface StagedWrites {
  readonly name: string;
  commitStaged(): void;
  discardStaged(): void;
}

export class UnitOfWork {
  private enlisted: Set<StagedWrites> | null = null;
  private afterCommitCallbacks: Array<() => void> = [];

  get isActive(): boolean {
    return this.enlisted !== null;
  }

  run<T>(fn: () => T): T {
    if (this.enlisted) {
      return fn();
    }

    this.enlisted = new Set();
    this.afterCommitCallbacks = [];
    let committed = false;

    try {
      const result = fn();
      if (result instanceof Promise) {
        throw new Error("UnitOfWork.run does not accept async work; await before opening the unit");
      }
      for (const store of this.enlisted) {
        store.commitStaged();
      }
      committed = true;
      return result;
    } finally {
      const stores = this.enlisted;
      const callbacks = this.afterCommitCallbacks;
      this.enlisted = null;
      this.afterCommitCallbacks = [];

      if (!committed) {
        for (const store of stores) {
          store.discardStaged();
        }
      } else {
        for (const callback of callbacks) {
          callback();
        }
      }
    }
  }

  /**
   * Called by a store before staging its first write in the current unit.
   */
  enlist(store: StagedWrites): void {
    if (!this.enlisted) {
      throw new Error(`Write to store "${store.name}" outside of a unit of work`);
    }
    this.enlisted.add(store);
  }

  /**
   * Runs the callback once the current unit commits. Dropped on discard.
   */
  afterCommit(callback: () => void): void {
    if (!this.enlisted) {
      throw new Error("afterCommit called outside of a unit of work");
    }
    this.afterCommitCallbacks.push(callback);
  }
}
