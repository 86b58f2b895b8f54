/**
 * NotificationCenter - turns claim events into in-app notifications and
 * serves each employee's inbox.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { formatAmount } from "../policy/limit-validator.js";
import type {
  EmployeeStorage,
  NotificationStorage,
  PaginatedResult,
} from "../storage/storage-interface.js";
import { NotificationId, type EmployeeId } from "../types/branded.js";
import type {
  Claim,
  ClaimEvent,
  Notification,
  NotificationType,
  Role,
} from "../types/claim-contract.js";
import { NotFoundError, roleLabel } from "./errors.js";
import { stageRole } from "./state-machine.js";

interface Draft {
  recipientId: EmployeeId;
  type: NotificationType;
  title: string;
  message: string;
}

export interface InboxOptions {
  unreadOnly?: boolean;
  offset?: number;
  limit?: number;
}

export interface Inbox extends PaginatedResult<Notification> {
  unreadCount: number;
}

function describe(claim: Claim): string {
  return `${claim.id} (${claim.category}, ${claim.currency} ${formatAmount(claim.amount)})`;
}

function lastComment(claim: Claim): string | null {
  return claim.decisions[claim.decisions.length - 1]?.comment ?? null;
}

export class NotificationCenter {
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly notifications: NotificationStorage,
    private readonly employees: EmployeeStorage,
    options: { logger?: Logger; now?: () => Date } = {}
  ) {
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /** Event bus listener */
  readonly handleEvent = async (event: ClaimEvent): Promise<void> => {
    const drafts = await this.draftsFor(event);
    const createdAt = this.now().toISOString();
    for (const draft of drafts) {
      await this.notifications.create({
        id: NotificationId(`ntf_${randomUUID()}`),
        claimId: event.claimId,
        isRead: false,
        readAt: null,
        createdAt,
        ...draft,
      });
    }
    if (drafts.length > 0) {
      this.logger?.debug(
        { eventId: event.eventId, claimId: event.claimId, count: drafts.length },
        "Notifications created"
      );
    }
  };

  // ===========================================================================
  // § Inbox
  // ===========================================================================

  async list(recipientId: EmployeeId, options: InboxOptions = {}): Promise<Inbox> {
    const [page, unreadCount] = await Promise.all([
      this.notifications.listForRecipient(recipientId, options),
      this.notifications.countUnread(recipientId),
    ]);
    return { ...page, unreadCount };
  }

  unreadCount(recipientId: EmployeeId): Promise<number> {
    return this.notifications.countUnread(recipientId);
  }

  async markRead(recipientId: EmployeeId, id: NotificationId): Promise<Notification> {
    const updated = await this.notifications.markRead(id, recipientId, this.now().toISOString());
    if (!updated) {
      throw new NotFoundError("Notification", id);
    }
    return updated;
  }

  markAllRead(recipientId: EmployeeId): Promise<number> {
    return this.notifications.markAllRead(recipientId, this.now().toISOString());
  }

  async delete(recipientId: EmployeeId, id: NotificationId): Promise<void> {
    const deleted = await this.notifications.delete(id, recipientId);
    if (!deleted) {
      throw new NotFoundError("Notification", id);
    }
  }

  /** Deletes the whole inbox, returning how many notifications went */
  clearAll(recipientId: EmployeeId): Promise<number> {
    return this.notifications.deleteAll(recipientId);
  }

  // ===========================================================================
  // § Recipients
  // ===========================================================================

  private async draftsFor(event: ClaimEvent): Promise<Draft[]> {
    const { claim } = event;
    const owner = claim.ownerId;

    switch (event.type) {
      case "claim.submitted":
        return [
          {
            recipientId: owner,
            type: "claim_submitted",
            title: "Claim submitted",
            message: `Your claim ${describe(claim)} was submitted for manager review.`,
          },
          ...(await this.reviewersFor(claim, "manager")),
        ];

      case "claim.advanced": {
        const next = stageRole(claim.status);
        const label = next ? roleLabel(next) : "the next reviewer";
        return [
          {
            recipientId: owner,
            type: "claim_advanced",
            title: "Claim moved forward",
            message: `Your claim ${describe(claim)} was approved and is now with ${label}.`,
          },
          ...(next ? await this.reviewersFor(claim, next) : []),
        ];
      }

      case "claim.approved":
        return [
          {
            recipientId: owner,
            type: "claim_approved",
            title: "Claim approved",
            message: `Your claim ${describe(claim)} was approved.`,
          },
        ];

      case "claim.rejected": {
        const reason = lastComment(claim);
        return [
          {
            recipientId: owner,
            type: "claim_rejected",
            title: "Claim rejected",
            message: `Your claim ${describe(claim)} was rejected by ${roleLabel(event.actor.role)}${
              reason ? `: ${reason}` : "."
            }`,
          },
        ];
      }

      case "claim.updated":
      case "claim.deleted":
        return [];
    }
  }

  private async reviewersFor(claim: Claim, role: Role): Promise<Draft[]> {
    const reviewers = await this.employees.listByRole(role);
    return reviewers
      .filter((reviewer) => reviewer.id !== claim.ownerId)
      .map((reviewer) => ({
        recipientId: reviewer.id,
        type: "approval_required" as const,
        title: "Approval required",
        message: `Claim ${describe(claim)} is waiting for ${roleLabel(role)} review.`,
      }));
  }
}
