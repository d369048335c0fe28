import mongoose, { type FilterQuery } from "mongoose";
import { adminPermissionSchema, adminRoleSchema, adminStatusSchema, auditOutcomeSchema, kycStatusSchema } from "@admin-access/shared-types";
import { z } from "zod";
import { AdminAccessError } from "../lib/errors.js";
import { AdminAuditLogModel, type AdminAuditLogDocument, type LeanAdminAuditLog } from "../models/adminAuditLog.js";
import { AdminUserModel, type AdminUserDocument, type LeanAdminUser } from "../models/adminUser.js";
import { OtpChallengeModel, type LeanOtpChallenge } from "../models/otpChallenge.js";
import { PlatformUserModel, type LeanPlatformUser, type PlatformUserDocument } from "../models/platformUser.js";
import { parseObjectId } from "../utils/ids.js";
import {
  OTP_CHALLENGE_STATES,
  type AdminStores,
  type AdminUserRecord,
  type AdminUserStore,
  type AuditLogRecord,
  type AuditLogStore,
  type OtpChallengeRecord,
  type OtpChallengeStore,
  type PlatformUserRecord,
  type PlatformUserStore,
  type TransactionRunner
} from "./types.js";

const permissionListSchema = z.array(adminPermissionSchema);
const challengeStateSchema = z.enum(OTP_CHALLENGE_STATES);
const metadataSchema = z.record(z.unknown());

async function withStorage<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof AdminAccessError) {
      throw error;
    }
    throw new AdminAccessError("StorageFailure", `Storage operation failed: ${operation}`, { cause: error });
  }
}

// Store calls inside `work` join the session through async local storage, enabled in db/connect.ts.
export const runInMongoTransaction: TransactionRunner = (work) => mongoose.connection.transaction(() => work());

function isDuplicateKeyError(error: unknown) {
  return error instanceof mongoose.mongo.MongoServerError && error.code === 11000;
}

function escapeRegex(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function toAdminUser(doc: LeanAdminUser): AdminUserRecord {
  return {
    id: doc._id.toString(),
    email: doc.email,
    fullName: doc.fullName,
    role: adminRoleSchema.parse(doc.role),
    permissions: permissionListSchema.parse(doc.permissions),
    status: adminStatusSchema.parse(doc.status),
    promotedBy: doc.promotedBy ?? null,
    promotedAt: doc.promotedAt,
    demotedBy: doc.demotedBy ?? null,
    demotedAt: doc.demotedAt ?? null,
    lastLoginAt: doc.lastLoginAt ?? null,
    loginCount: doc.loginCount,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt
  };
}

function toPlatformUser(doc: LeanPlatformUser): PlatformUserRecord {
  return {
    id: doc._id.toString(),
    email: doc.email,
    fullName: doc.fullName,
    kycStatus: kycStatusSchema.parse(doc.kycStatus),
    activeViolations: doc.activeViolations,
    adminRole: doc.adminRole ? adminRoleSchema.parse(doc.adminRole) : null,
    createdAt: doc.createdAt
  };
}

function toChallenge(doc: LeanOtpChallenge): OtpChallengeRecord {
  return {
    id: doc._id.toString(),
    email: doc.email,
    codeHash: doc.codeHash,
    issuedAt: doc.issuedAt,
    expiresAt: doc.expiresAt,
    attemptsRemaining: doc.attemptsRemaining,
    state: challengeStateSchema.parse(doc.state),
    closedAt: doc.closedAt ?? null
  };
}

function toAuditLog(doc: LeanAdminAuditLog): AuditLogRecord {
  return {
    id: doc._id.toString(),
    actorId: doc.actorId,
    actorEmail: doc.actorEmail,
    action: doc.action,
    targetType: doc.targetType,
    targetId: doc.targetId ?? null,
    targetEmail: doc.targetEmail ?? null,
    outcome: auditOutcomeSchema.parse(doc.outcome),
    detail: doc.detail,
    metadata: metadataSchema.parse(doc.metadata ?? {}),
    createdAt: doc.createdAt
  };
}

export function createMongoAdminUserStore(): AdminUserStore {
  return {
    findById: (id) =>
      withStorage("admins.findById", async () => {
        const objectId = parseObjectId(id);
        if (!objectId) {
          return null;
        }
        const doc = await AdminUserModel.findById(objectId).lean<LeanAdminUser>();
        return doc ? toAdminUser(doc) : null;
      }),

    findByEmail: (email) =>
      withStorage("admins.findByEmail", async () => {
        const doc = await AdminUserModel.findOne({ email: email.toLowerCase() }).lean<LeanAdminUser>();
        return doc ? toAdminUser(doc) : null;
      }),

    countActive: () => withStorage("admins.countActive", () => AdminUserModel.countDocuments({ status: "active" })),

    listActiveEmails: () =>
      withStorage("admins.listActiveEmails", async () => {
        const docs = await AdminUserModel.find({ status: "active" }).select({ email: 1 }).lean<Array<{ email: string }>>();
        return docs.map((doc) => doc.email);
      }),

    list: (filter, page) =>
      withStorage("admins.list", async () => {
        const query: FilterQuery<AdminUserDocument> = {};
        if (filter.status) {
          query.status = filter.status;
        }
        if (filter.role) {
          query.role = filter.role;
        }
        const [docs, total] = await Promise.all([
          AdminUserModel.find(query).sort({ createdAt: -1 }).skip(page.skip).limit(page.limit).lean<LeanAdminUser[]>(),
          AdminUserModel.countDocuments(query)
        ]);
        return { rows: docs.map(toAdminUser), total };
      }),

    create: (input, now) =>
      withStorage<AdminUserRecord>("admins.create", async () => {
        try {
          const email = input.email.toLowerCase();
          const doc = await AdminUserModel.create({ ...input, email, status: "active", createdAt: now, updatedAt: now });
          return {
            ...input,
            id: doc._id.toString(),
            email,
            permissions: [...input.permissions],
            status: "active",
            demotedBy: null,
            demotedAt: null,
            lastLoginAt: null,
            loginCount: 0,
            createdAt: now,
            updatedAt: now
          };
        } catch (error) {
          if (isDuplicateKeyError(error)) {
            throw new AdminAccessError("AlreadyAdmin", "An admin with this email already exists");
          }
          throw error;
        }
      }),

    update: (id, patch, now) =>
      withStorage("admins.update", async () => {
        const objectId = parseObjectId(id);
        if (!objectId) {
          return null;
        }
        const doc = await AdminUserModel.findByIdAndUpdate(
          objectId,
          { $set: { ...patch, updatedAt: now } },
          { new: true, timestamps: false }
        ).lean<LeanAdminUser>();
        return doc ? toAdminUser(doc) : null;
      }),

    recordLogin: (id, at) =>
      withStorage("admins.recordLogin", async () => {
        const objectId = parseObjectId(id);
        if (!objectId) {
          return;
        }
        await AdminUserModel.updateOne({ _id: objectId }, { $set: { lastLoginAt: at }, $inc: { loginCount: 1 } });
      })
  };
}

export function createMongoPlatformUserStore(): PlatformUserStore {
  return {
    findById: (id) =>
      withStorage("users.findById", async () => {
        const objectId = parseObjectId(id);
        if (!objectId) {
          return null;
        }
        const doc = await PlatformUserModel.findById(objectId).lean<LeanPlatformUser>();
        return doc ? toPlatformUser(doc) : null;
      }),

    findByEmail: (email) =>
      withStorage("users.findByEmail", async () => {
        const doc = await PlatformUserModel.findOne({ email: email.toLowerCase() }).lean<LeanPlatformUser>();
        return doc ? toPlatformUser(doc) : null;
      }),

    listEligible: (filter, page) =>
      withStorage("users.listEligible", async () => {
        const query: FilterQuery<PlatformUserDocument> = {
          email: { $nin: filter.excludeEmails },
          kycStatus: "verified",
          activeViolations: { $lte: 0 }
        };
        if (filter.search) {
          const pattern = new RegExp(escapeRegex(filter.search), "i");
          query.$or = [{ fullName: pattern }, { email: pattern }];
        }
        const [docs, total] = await Promise.all([
          PlatformUserModel.find(query).sort({ createdAt: -1 }).skip(page.skip).limit(page.limit).lean<LeanPlatformUser[]>(),
          PlatformUserModel.countDocuments(query)
        ]);
        return { rows: docs.map(toPlatformUser), total };
      }),

    setAdminRole: (id, role, now) =>
      withStorage("users.setAdminRole", async () => {
        const objectId = parseObjectId(id);
        if (!objectId) {
          return;
        }
        await PlatformUserModel.updateOne({ _id: objectId }, { $set: { adminRole: role, updatedAt: now } }, { timestamps: false });
      })
  };
}

export function createMongoOtpChallengeStore(runInTransaction: TransactionRunner = runInMongoTransaction): OtpChallengeStore {
  return {
    findLatest: (email) =>
      withStorage("challenges.findLatest", async () => {
        const doc = await OtpChallengeModel.findOne({ email: email.toLowerCase() })
          .sort({ issuedAt: -1 })
          .lean<LeanOtpChallenge>();
        return doc ? toChallenge(doc) : null;
      }),

    issue: (input) =>
      withStorage<OtpChallengeRecord>("challenges.issue", () =>
        runInTransaction<OtpChallengeRecord>(async () => {
          const email = input.email.toLowerCase();
          await OtpChallengeModel.updateMany(
            { email, state: "pending" },
            { $set: { state: "superseded", closedAt: input.issuedAt } }
          );
          try {
            const doc = await OtpChallengeModel.create({ ...input, email, state: "pending" });
            return { ...input, id: doc._id.toString(), email, state: "pending", closedAt: null };
          } catch (error) {
            if (isDuplicateKeyError(error)) {
              throw new AdminAccessError("RateLimited", "Another OTP was issued concurrently; retry shortly");
            }
            throw error;
          }
        })
      ),

    recordFailedAttempt: (id, at) =>
      withStorage("challenges.recordFailedAttempt", async () => {
        const objectId = parseObjectId(id);
        if (!objectId) {
          return null;
        }
        const doc = await OtpChallengeModel.findOneAndUpdate(
          { _id: objectId, state: "pending", attemptsRemaining: { $gt: 0 } },
          { $inc: { attemptsRemaining: -1 } },
          { new: true }
        ).lean<LeanOtpChallenge>();
        if (!doc) {
          return null;
        }
        if (doc.attemptsRemaining > 0) {
          return toChallenge(doc);
        }
        await OtpChallengeModel.updateOne({ _id: objectId, state: "pending" }, { $set: { state: "exhausted", closedAt: at } });
        return toChallenge({ ...doc, state: "exhausted", closedAt: at });
      }),

    close: (id, state, at) =>
      withStorage("challenges.close", async () => {
        const objectId = parseObjectId(id);
        if (!objectId) {
          return false;
        }
        const result = await OtpChallengeModel.updateOne({ _id: objectId, state: "pending" }, { $set: { state, closedAt: at } });
        return result.modifiedCount === 1;
      })
  };
}

export function createMongoAuditLogStore(): AuditLogStore {
  return {
    append: (entry) =>
      withStorage("auditLogs.append", async () => {
        const doc = await AdminAuditLogModel.create(entry);
        return { ...entry, id: doc._id.toString() };
      }),

    list: (filter, page) =>
      withStorage("auditLogs.list", async () => {
        const query: FilterQuery<AdminAuditLogDocument> = {};
        if (filter.actor) {
          query.$or = [{ actorEmail: filter.actor.toLowerCase() }, { actorId: filter.actor }];
        }
        if (filter.action) {
          query.action = filter.action;
        }
        if (filter.targetId) {
          query.targetId = filter.targetId;
        }
        if (filter.outcome) {
          query.outcome = filter.outcome;
        }
        if (filter.from || filter.to) {
          query.createdAt = {
            ...(filter.from ? { $gte: filter.from } : {}),
            ...(filter.to ? { $lte: filter.to } : {})
          };
        }
        const [docs, total] = await Promise.all([
          AdminAuditLogModel.find(query).sort({ createdAt: -1 }).skip(page.skip).limit(page.limit).lean<LeanAdminAuditLog[]>(),
          AdminAuditLogModel.countDocuments(query)
        ]);
        return { rows: docs.map(toAuditLog), total };
      })
  };
}

export function createMongoStores(runInTransaction: TransactionRunner = runInMongoTransaction): AdminStores {
  return {
    admins: createMongoAdminUserStore(),
    users: createMongoPlatformUserStore(),
    challenges: createMongoOtpChallengeStore(runInTransaction),
    auditLogs: createMongoAuditLogStore(),
    transaction: runInTransaction
  };
}
