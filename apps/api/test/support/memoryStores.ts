import type { AdminRole } from "@admin-access/shared-types";
import { AdminAccessError } from "../../src/lib/errors.js";
import type {
  AdminStores,
  AdminUserRecord,
  AdminUserStore,
  AuditLogRecord,
  AuditLogStore,
  OtpChallengeRecord,
  OtpChallengeStore,
  PageRequest,
  PlatformUserRecord,
  PlatformUserStore,
  TransactionRunner
} from "../../src/stores/types.js";
import { newId } from "../../src/utils/ids.js";

/** Captures a store's contents; calling the result puts them back. */
type Snapshot = () => () => void;

function pageOf<T>(rows: T[], page: PageRequest) {
  return { rows: rows.slice(page.skip, page.skip + page.limit), total: rows.length };
}

export function createMemoryAdminUserStore(): AdminUserStore & { all(): AdminUserRecord[]; snapshot: Snapshot } {
  const admins = new Map<string, AdminUserRecord>();

  return {
    all: () => [...admins.values()],
    snapshot() {
      const saved = new Map(admins);
      return () => {
        admins.clear();
        saved.forEach((admin, id) => admins.set(id, admin));
      };
    },
    async findById(id) {
      return admins.get(id) ?? null;
    },
    async findByEmail(email) {
      const normalized = email.toLowerCase();
      return [...admins.values()].find((admin) => admin.email === normalized) ?? null;
    },
    async countActive() {
      return [...admins.values()].filter((admin) => admin.status === "active").length;
    },
    async listActiveEmails() {
      return [...admins.values()].filter((admin) => admin.status === "active").map((admin) => admin.email);
    },
    async list(filter, page) {
      const rows = [...admins.values()]
        .filter((admin) => (!filter.status || admin.status === filter.status) && (!filter.role || admin.role === filter.role))
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
      return pageOf(rows, page);
    },
    async create(input, now) {
      const record: AdminUserRecord = {
        ...input,
        id: newId(),
        email: input.email.toLowerCase(),
        status: "active",
        demotedBy: null,
        demotedAt: null,
        lastLoginAt: null,
        loginCount: 0,
        createdAt: now,
        updatedAt: now
      };
      admins.set(record.id, record);
      return record;
    },
    async update(id, patch, now) {
      const current = admins.get(id);
      if (!current) {
        return null;
      }
      const next: AdminUserRecord = { ...current, ...patch, updatedAt: now };
      admins.set(id, next);
      return next;
    },
    async recordLogin(id, at) {
      const current = admins.get(id);
      if (current) {
        admins.set(id, { ...current, lastLoginAt: at, loginCount: current.loginCount + 1 });
      }
    }
  };
}

export function createMemoryPlatformUserStore(): PlatformUserStore & {
  add(user: PlatformUserRecord): void;
  snapshot: Snapshot;
} {
  const users = new Map<string, PlatformUserRecord>();

  return {
    snapshot() {
      const saved = new Map(users);
      return () => {
        users.clear();
        saved.forEach((user, id) => users.set(id, user));
      };
    },
    add(user) {
      users.set(user.id, user);
    },
    async findById(id) {
      return users.get(id) ?? null;
    },
    async findByEmail(email) {
      const normalized = email.toLowerCase();
      return [...users.values()].find((user) => user.email === normalized) ?? null;
    },
    async listEligible(filter, page) {
      const search = filter.search?.toLowerCase();
      const rows = [...users.values()]
        .filter((user) => user.kycStatus === "verified" && user.activeViolations === 0)
        .filter((user) => !filter.excludeEmails.includes(user.email))
        .filter(
          (user) => !search || user.email.includes(search) || user.fullName.toLowerCase().includes(search)
        )
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
      return pageOf(rows, page);
    },
    async setAdminRole(id: string, role: AdminRole | null) {
      const current = users.get(id);
      if (current) {
        users.set(id, { ...current, adminRole: role });
      }
    }
  };
}

export function createMemoryOtpChallengeStore(): OtpChallengeStore & { all(): OtpChallengeRecord[]; snapshot: Snapshot } {
  const challenges: OtpChallengeRecord[] = [];

  function pendingIndex(id: string) {
    return challenges.findIndex((challenge) => challenge.id === id && challenge.state === "pending");
  }

  return {
    all: () => challenges.map((challenge) => ({ ...challenge })),
    snapshot() {
      const saved = [...challenges];
      return () => {
        challenges.splice(0, challenges.length, ...saved);
      };
    },
    async findLatest(email) {
      const normalized = email.toLowerCase();
      const latest = challenges
        .filter((challenge) => challenge.email === normalized)
        .reduce<OtpChallengeRecord | null>(
          (found, challenge) => (!found || challenge.issuedAt.getTime() >= found.issuedAt.getTime() ? challenge : found),
          null
        );
      return latest ? { ...latest } : null;
    },
    async issue(input) {
      challenges.forEach((challenge, index) => {
        if (challenge.email === input.email && challenge.state === "pending") {
          challenges[index] = { ...challenge, state: "superseded", closedAt: input.issuedAt };
        }
      });
      const record: OtpChallengeRecord = { ...input, id: newId(), state: "pending", closedAt: null };
      challenges.push(record);
      return { ...record };
    },
    async recordFailedAttempt(id, at) {
      const index = pendingIndex(id);
      if (index < 0) {
        return null;
      }
      const current = challenges[index];
      const attemptsRemaining = current.attemptsRemaining - 1;
      const next: OtpChallengeRecord =
        attemptsRemaining <= 0
          ? { ...current, attemptsRemaining: 0, state: "exhausted", closedAt: at }
          : { ...current, attemptsRemaining };
      challenges[index] = next;
      return { ...next };
    },
    async close(id, state, at) {
      const index = pendingIndex(id);
      if (index < 0) {
        return false;
      }
      challenges[index] = { ...challenges[index], state, closedAt: at };
      return true;
    }
  };
}

export function createMemoryAuditLogStore(): AuditLogStore & {
  all(): AuditLogRecord[];
  failNextAppend(): void;
  snapshot: Snapshot;
} {
  const entries: AuditLogRecord[] = [];
  let failNext = false;

  return {
    all: () => [...entries],
    snapshot() {
      const saved = [...entries];
      return () => {
        entries.splice(0, entries.length, ...saved);
      };
    },
    failNextAppend() {
      failNext = true;
    },
    async append(entry) {
      if (failNext) {
        failNext = false;
        throw new AdminAccessError("StorageFailure", "audit store unavailable");
      }
      const record: AuditLogRecord = { ...entry, id: newId() };
      entries.push(record);
      return record;
    },
    async list(filter, page) {
      const rows = entries
        .filter((entry) => !filter.actor || entry.actorEmail === filter.actor || entry.actorId === filter.actor)
        .filter((entry) => !filter.action || entry.action === filter.action)
        .filter((entry) => !filter.targetId || entry.targetId === filter.targetId)
        .filter((entry) => !filter.outcome || entry.outcome === filter.outcome)
        .filter((entry) => !filter.from || entry.createdAt.getTime() >= filter.from.getTime())
        .filter((entry) => !filter.to || entry.createdAt.getTime() <= filter.to.getTime())
        .reverse();
      return pageOf(rows, page);
    }
  };
}

export type MemoryStores = AdminStores & {
  admins: ReturnType<typeof createMemoryAdminUserStore>;
  users: ReturnType<typeof createMemoryPlatformUserStore>;
  challenges: ReturnType<typeof createMemoryOtpChallengeStore>;
  auditLogs: ReturnType<typeof createMemoryAuditLogStore>;
};

export function createMemoryStores(): MemoryStores {
  const admins = createMemoryAdminUserStore();
  const users = createMemoryPlatformUserStore();
  const challenges = createMemoryOtpChallengeStore();
  const auditLogs = createMemoryAuditLogStore();

  // Tests run one operation at a time, so restoring snapshots is enough to roll back.
  const transaction: TransactionRunner = async (work) => {
    const rollbacks = [admins.snapshot(), users.snapshot(), challenges.snapshot(), auditLogs.snapshot()];
    try {
      return await work();
    } catch (error) {
      rollbacks.forEach((rollback) => rollback());
      throw error;
    }
  };

  return { admins, users, challenges, auditLogs, transaction };
}
