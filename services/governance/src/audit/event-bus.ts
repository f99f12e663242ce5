/**
 * Governance Event Bus
 *
 * Append-only audit stream. Components publish through the unit of work
 * so an event goes out only once the action that produced it commits.
 */

import * as crypto from "crypto";
import { EventEmitter } from "eventemitter3";
import {
  governanceLogger as logger,
  AUDIT_DEFAULTS,
  CURRENT_SCHEMA_VERSION,
  type EventValue,
  type GovernanceEvent,
  type GovernanceEventKind,
} from "@civitas/shared";
import type { ActionContext } from "../clock.js";
import type { UnitOfWork } from "../store/index.js";

const busLogger = logger.child({ component: "event-bus" });

export interface GovernanceEventBusEvents {
  event: (event: GovernanceEvent) => void;
}

export type EventChanges = Record<string, EventValue | bigint | undefined>;

export class GovernanceEventBus extends EventEmitter<GovernanceEventBusEvents> {
  private readonly history: GovernanceEvent[] = [];
  private sequence = 0;

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly maxHistorySize: number = AUDIT_DEFAULTS.historySize
  ) {
    super();
  }

  /**
   * Queues an event for emission when the current unit of work commits.
   * Bigint amounts become decimal strings; undefined fields are dropped.
   */
  publish(
    ctx: ActionContext,
    kind: GovernanceEventKind,
    subject: Record<string, string>,
    changes: EventChanges
  ): void {
    const normalized: Record<string, EventValue> = {};
    for (const [field, value] of Object.entries(changes)) {
      if (value === undefined) continue;
      normalized[field] = typeof value === "bigint" ? value.toString() : value;
    }

    this.unitOfWork.afterCommit(() => {
      const event: GovernanceEvent = {
        schemaVersion: CURRENT_SCHEMA_VERSION,
        id: crypto.randomUUID(),
        sequence: ++this.sequence,
        kind,
        actor: ctx.caller,
        epoch: ctx.epoch,
        subject: { ...subject },
        changes: normalized,
      };

      this.history.push(event);
      if (this.history.length > this.maxHistorySize) {
        this.history.splice(0, this.history.length - this.maxHistorySize);
      }

      busLogger.debug({ sequence: event.sequence, kind, subject }, "Governance event emitted");
      // Delivery is best effort: the action has already committed.
      try {
        this.emit("event", event);
      } catch (error) {
        busLogger.error(
          { sequence: event.sequence, kind, err: error instanceof Error ? error.message : String(error) },
          "Governance event listener failed"
        );
      }
    });
  }

  getHistory(limit?: number): GovernanceEvent[] {
    return limit === undefined ? [...this.history] : this.history.slice(-limit);
  }

  getByKind(kind: GovernanceEventKind): GovernanceEvent[] {
    return this.history.filter((e) => e.kind === kind);
  }

  getLastSequence(): number {
    return this.sequence;
  }
}
