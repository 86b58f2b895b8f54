/**
 * Claim event bus: fans committed claim changes out to listeners
 * (notifications, metrics).
 */

import type { Logger } from "pino";
import type { ClaimEvent } from "../types/claim-contract.js";

export type ClaimEventListener = (event: ClaimEvent) => Promise<void> | void;

export interface ClaimEventEmitter {
  emit(event: ClaimEvent): Promise<void>;
}

export class ClaimEventBus implements ClaimEventEmitter {
  private listeners: ClaimEventListener[] = [];

  constructor(private readonly logger?: Logger) {}

  addListener(listener: ClaimEventListener): void {
    this.listeners.push(listener);
  }

  /**
   * Resolves after every listener settles. A failing listener is logged and
   * does not stop the others.
   */
  async emit(event: ClaimEvent): Promise<void> {
    const results = await Promise.allSettled(
      this.listeners.map(async (listener) => listener(event))
    );
    for (const result of results) {
      if (result.status === "rejected") {
        this.logger?.error(
          { err: result.reason, eventId: event.eventId, type: event.type, claimId: event.claimId },
          "Claim event listener failed"
        );
      }
    }
  }
}
