import type { AuditLogQuery } from "@admin-access/shared-types";
import { AdminAccessError, errorMessage } from "../lib/errors.js";
import type { AuditLogRecord, AuditLogStore, TransactionRunner } from "../stores/types.js";
import type { Clock } from "../lib/clock.js";

export type AuditAction = "promote" | "demote" | "update_admin" | "bootstrap";
export type AuditActor = { id: string; email: string };

export const SYSTEM_ACTOR: AuditActor = { id: "system", email: "system" };

/** Mutable while the audited operation runs; written once it settles. */
export type AuditDraft = {
  targetType: "platform_user" | "admin_user";
  targetId: string | null;
  targetEmail: string | null;
  detail: string;
  metadata: Record<string, unknown>;
};

export type AuditRecorder = ReturnType<typeof createAuditRecorder>;

export function createAuditRecorder(store: AuditLogStore, clock: Clock, transaction: TransactionRunner) {
  async function append(actor: AuditActor, action: AuditAction, draft: AuditDraft, outcome: "success" | "failure") {
    return store.append({
      actorId: actor.id,
      actorEmail: actor.email,
      action,
      targetType: draft.targetType,
      targetId: draft.targetId,
      targetEmail: draft.targetEmail,
      outcome,
      detail: draft.detail,
      metadata: draft.metadata,
      createdAt: clock()
    });
  }

  /**
   * Runs a mutating admin operation and records exactly one audit entry for it.
   * The operation's writes and its success entry commit in one transaction; when
   * either throws, nothing is kept and a failure entry with the error code is written instead.
   */
  async function run<T>(
    actor: AuditActor,
    action: AuditAction,
    draft: AuditDraft,
    operation: (draft: AuditDraft) => Promise<T>
  ): Promise<T> {
    const intent = { detail: draft.detail, metadata: draft.metadata };
    try {
      return await transaction(async () => {
        const result = await operation(draft);
        await append(actor, action, draft, "success");
        return result;
      });
    } catch (error) {
      const failed: AuditDraft = {
        ...draft,
        detail: `${intent.detail} failed: ${errorMessage(error)}`,
        metadata: {
          ...intent.metadata,
          errorCode: error instanceof AdminAccessError ? error.code : "InternalError"
        }
      };
      try {
        await append(actor, action, failed, "failure");
      } catch (auditError) {
        console.error("[api][audit] failed to record failed action", {
          action,
          actor: actor.email,
          error: errorMessage(auditError)
        });
      }
      throw error;
    }
  }

  async function list(query: AuditLogQuery) {
    const { page, limit, ...filter } = query;
    const { rows, total } = await store.list(filter, { skip: (page - 1) * limit, limit });
    return {
      entries: rows.map(toAuditLogView),
      total,
      page,
      limit,
      pages: Math.ceil(total / limit)
    };
  }

  return { run, list };
}

export function toAuditLogView(entry: AuditLogRecord) {
  return {
    id: entry.id,
    actor: { id: entry.actorId, email: entry.actorEmail },
    action: entry.action,
    target: { type: entry.targetType, id: entry.targetId, email: entry.targetEmail },
    outcome: entry.outcome,
    detail: entry.detail,
    metadata: entry.metadata,
    createdAt: entry.createdAt
  };
}
