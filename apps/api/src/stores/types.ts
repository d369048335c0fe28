import type {
  AdminPermission,
  AdminRole,
  AdminStatus,
  AuditOutcome,
  KycStatus
} from "@admin-access/shared-types";

export const OTP_CHALLENGE_STATES = ["pending", "consumed", "expired", "exhausted", "superseded"] as const;

export type OtpChallengeState = (typeof OTP_CHALLENGE_STATES)[number];
export type TerminalChallengeState = Exclude<OtpChallengeState, "pending">;

export type PageRequest = { skip: number; limit: number };
export type PageResult<T> = { rows: T[]; total: number };

export type AdminUserRecord = {
  id: string;
  email: string;
  fullName: string;
  role: AdminRole;
  permissions: AdminPermission[];
  status: AdminStatus;
  promotedBy: string | null;
  promotedAt: Date;
  demotedBy: string | null;
  demotedAt: Date | null;
  lastLoginAt: Date | null;
  loginCount: number;
  createdAt: Date;
  updatedAt: Date;
};

export type NewAdminUser = Pick<
  AdminUserRecord,
  "email" | "fullName" | "role" | "permissions" | "promotedBy" | "promotedAt"
>;

export type AdminUserPatch = Partial<
  Pick<
    AdminUserRecord,
    "fullName" | "role" | "permissions" | "status" | "promotedBy" | "promotedAt" | "demotedBy" | "demotedAt"
  >
>;

export interface AdminUserStore {
  findById(id: string): Promise<AdminUserRecord | null>;
  findByEmail(email: string): Promise<AdminUserRecord | null>;
  countActive(): Promise<number>;
  listActiveEmails(): Promise<string[]>;
  list(filter: { status?: AdminStatus; role?: AdminRole }, page: PageRequest): Promise<PageResult<AdminUserRecord>>;
  create(input: NewAdminUser, now: Date): Promise<AdminUserRecord>;
  update(id: string, patch: AdminUserPatch, now: Date): Promise<AdminUserRecord | null>;
  recordLogin(id: string, at: Date): Promise<void>;
}

export type PlatformUserRecord = {
  id: string;
  email: string;
  fullName: string;
  kycStatus: KycStatus;
  activeViolations: number;
  adminRole: AdminRole | null;
  createdAt: Date;
};

export interface PlatformUserStore {
  findById(id: string): Promise<PlatformUserRecord | null>;
  findByEmail(email: string): Promise<PlatformUserRecord | null>;
  /** Verified users with no active violations whose email is not excluded. */
  listEligible(filter: { search?: string; excludeEmails: string[] }, page: PageRequest): Promise<PageResult<PlatformUserRecord>>;
  setAdminRole(id: string, role: AdminRole | null, now: Date): Promise<void>;
}

export type OtpChallengeRecord = {
  id: string;
  email: string;
  codeHash: string;
  issuedAt: Date;
  expiresAt: Date;
  attemptsRemaining: number;
  state: OtpChallengeState;
  closedAt: Date | null;
};

export type NewOtpChallenge = Pick<OtpChallengeRecord, "email" | "codeHash" | "issuedAt" | "expiresAt" | "attemptsRemaining">;

export interface OtpChallengeStore {
  findLatest(email: string): Promise<OtpChallengeRecord | null>;
  /**
   * Supersedes any pending challenge for the email and stores the new one.
   * At most one challenge per email is ever pending.
   */
  issue(input: NewOtpChallenge): Promise<OtpChallengeRecord>;
  /**
   * Decrements the attempts of a pending challenge, moving it to `exhausted` at zero.
   * Resolves null when the challenge is no longer pending.
   */
  recordFailedAttempt(id: string, at: Date): Promise<OtpChallengeRecord | null>;
  /** Moves a pending challenge to a terminal state; false when it was not pending. */
  close(id: string, state: TerminalChallengeState, at: Date): Promise<boolean>;
}

export type AuditLogRecord = {
  id: string;
  actorId: string;
  actorEmail: string;
  action: string;
  targetType: string;
  targetId: string | null;
  targetEmail: string | null;
  outcome: AuditOutcome;
  detail: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
};

export type AuditLogFilter = {
  actor?: string;
  action?: string;
  targetId?: string;
  outcome?: AuditOutcome;
  from?: Date;
  to?: Date;
};

export interface AuditLogStore {
  append(entry: Omit<AuditLogRecord, "id">): Promise<AuditLogRecord>;
  list(filter: AuditLogFilter, page: PageRequest): Promise<PageResult<AuditLogRecord>>;
}

/** Runs `work` so that every store write inside it commits together or not at all. */
export type TransactionRunner = <T>(work: () => Promise<T>) => Promise<T>;

export type AdminStores = {
  admins: AdminUserStore;
  users: PlatformUserStore;
  challenges: OtpChallengeStore;
  auditLogs: AuditLogStore;
  transaction: TransactionRunner;
};
