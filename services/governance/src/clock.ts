/**
 * Logical Clock
 *
 * The epoch counter is supplied by the host environment. Core components
 * only ever receive it inside an ActionContext; nothing in the core
 * advances it.
 */

import type { AccountId } from "@civitas/shared";
import { InvalidInputError } from "./errors.js";

export interface LogicalClock {
  now(): number;
}

/**
 * Who is acting and at which logical time. Threaded explicitly through
 * every mutating operation.
 */
export interface ActionContext {
  caller: AccountId;
  epoch: number;
}

/**
 * Host-driven clock. Monotonic non-decreasing.
 */
export class ManualClock implements LogicalClock {
  private epoch: number;

  constructor(initial = 0) {
    ManualClock.assertEpoch(initial);
    this.epoch = initial;
  }

  now(): number {
    return this.epoch;
  }

  set(epoch: number): void {
    ManualClock.assertEpoch(epoch);
    if (epoch < this.epoch) {
      throw new InvalidInputError(
        `Clock cannot move backwards: current=${this.epoch}, requested=${epoch}`,
        "epoch"
      );
    }
    this.epoch = epoch;
  }

  advance(by = 1): number {
    if (!Number.isSafeInteger(by) || by < 0) {
      throw new InvalidInputError(`Invalid clock step: ${by}`, "epoch");
    }
    this.set(this.epoch + by);
    return this.epoch;
  }

  private static assertEpoch(epoch: number): void {
    if (!Number.isSafeInteger(epoch) || epoch < 0) {
      throw new InvalidInputError(`Invalid epoch: ${epoch}`, "epoch");
    }
  }
}

export function createActionContext(clock: LogicalClock, caller: AccountId): ActionContext {
  return { caller, epoch: clock.now() };
}
