import {
  ADMIN_PERMISSIONS,
  type AdminListQuery,
  type AdminUpdateRequest,
  type AuditLogQuery,
  type DemoteAdminRequest,
  type EligibleUsersQuery,
  type PromoteUserRequest
} from "@admin-access/shared-types";
import type { Clock } from "../lib/clock.js";
import { AdminAccessError } from "../lib/errors.js";
import type { AdminUserPatch, AdminUserRecord, AdminUserStore, PlatformUserRecord, PlatformUserStore } from "../stores/types.js";
import {
  assertCanGrantPermissions,
  assertCanManageRole,
  assertPermission,
  normalizePermissions,
  resolvePermissions,
  type AdminSession
} from "./accessControl.js";
import { SYSTEM_ACTOR, type AuditRecorder } from "./audit.js";
import { dispatchNotification, type AdminNotifier } from "./notificationQueue.js";

export type AdminManagementDeps = {
  admins: AdminUserStore;
  users: PlatformUserStore;
  notifier: AdminNotifier;
  audit: AuditRecorder;
  clock: Clock;
};

export type AdminManagementService = ReturnType<typeof createAdminManagementService>;

export function toAdminSummary(admin: AdminUserRecord) {
  return {
    id: admin.id,
    email: admin.email,
    fullName: admin.fullName,
    role: admin.role,
    permissions: admin.permissions,
    status: admin.status,
    promotedBy: admin.promotedBy,
    promotedAt: admin.promotedAt,
    demotedBy: admin.demotedBy,
    demotedAt: admin.demotedAt,
    lastLoginAt: admin.lastLoginAt,
    loginCount: admin.loginCount
  };
}

export type AdminSummary = ReturnType<typeof toAdminSummary>;

function toEligibleUserView(user: PlatformUserRecord) {
  return {
    id: user.id,
    email: user.email,
    fullName: user.fullName,
    kycStatus: user.kycStatus,
    createdAt: user.createdAt
  };
}

function paginate(page: number, limit: number, total: number) {
  return { total, page, limit, pages: Math.ceil(total / limit) };
}

function assertNotSelf(session: AdminSession, target: { id: string; email?: string }) {
  if (target.id === session.adminId || target.email === session.email) {
    throw new AdminAccessError("SelfDemotionForbidden", "Admins cannot demote or modify their own account");
  }
}

function assertEligible(user: PlatformUserRecord) {
  if (user.kycStatus !== "verified") {
    throw new AdminAccessError("IneligibleUser", "User must have verified KYC to become admin");
  }
  if (user.activeViolations > 0) {
    throw new AdminAccessError("IneligibleUser", "User has active violations");
  }
}

export function createAdminManagementService(deps: AdminManagementDeps) {
  const { admins, users, notifier, audit, clock } = deps;

  async function findAdmin(adminId: string) {
    const admin = await admins.findById(adminId);
    if (!admin) {
      throw new AdminAccessError("UnknownAdmin", "Admin user not found");
    }
    return admin;
  }

  async function saveAdmin(adminId: string, patch: AdminUserPatch, now: Date) {
    const updated = await admins.update(adminId, patch, now);
    if (!updated) {
      throw new AdminAccessError("UnknownAdmin", "Admin user not found");
    }
    return updated;
  }

  async function mirrorAdminRole(email: string, role: AdminUserRecord["role"] | null, now: Date) {
    const user = await users.findByEmail(email);
    if (user) {
      await users.setAdminRole(user.id, role, now);
    }
  }

  async function promoteUser(session: AdminSession, input: PromoteUserRequest) {
    const promoted = await audit.run(
      { id: session.adminId, email: session.email },
      "promote",
      {
        targetType: "platform_user",
        targetId: input.user_id,
        targetEmail: null,
        detail: `Promote user ${input.user_id} to ${input.role}`,
        metadata: { role: input.role }
      },
      async (draft) => {
        assertPermission(session, "admin_management");
        assertCanManageRole(session, input.role);
        const permissions = input.permissions ? normalizePermissions(input.permissions) : resolvePermissions(input.role);
        assertCanGrantPermissions(session, permissions);

        const user = await users.findById(input.user_id);
        if (!user) {
          throw new AdminAccessError("UserNotFound", "User not found");
        }
        draft.targetEmail = user.email;
        assertEligible(user);

        const existing = await admins.findByEmail(user.email);
        if (existing?.status === "active") {
          throw new AdminAccessError("AlreadyAdmin", "User is already an admin");
        }

        const now = clock();
        const fields = {
          fullName: user.fullName,
          role: input.role,
          permissions,
          promotedBy: session.email,
          promotedAt: now
        };
        const admin = existing
          ? await saveAdmin(existing.id, { ...fields, status: "active", demotedBy: null, demotedAt: null }, now)
          : await admins.create({ ...fields, email: user.email }, now);

        await users.setAdminRole(user.id, admin.role, now);

        draft.detail = `Promoted ${admin.email} to ${admin.role}`;
        draft.metadata = { ...draft.metadata, adminId: admin.id, permissions: admin.permissions, reactivated: Boolean(existing) };
        return toAdminSummary(admin);
      }
    );

    dispatchNotification("admin-promotion", promoted.email, () =>
      notifier.enqueuePromotion({
        email: promoted.email,
        fullName: promoted.fullName,
        role: promoted.role,
        permissions: promoted.permissions,
        promotedBy: session.email
      })
    );
    return promoted;
  }

  async function demoteAdmin(session: AdminSession, adminId: string, input: DemoteAdminRequest = {}) {
    const demoted = await audit.run(
      { id: session.adminId, email: session.email },
      "demote",
      {
        targetType: "admin_user",
        targetId: adminId,
        targetEmail: null,
        detail: `Demote admin ${adminId}`,
        metadata: input.reason ? { reason: input.reason } : {}
      },
      async (draft) => {
        assertNotSelf(session, { id: adminId });
        assertPermission(session, "admin_management");

        const target = await findAdmin(adminId);
        draft.targetEmail = target.email;
        assertNotSelf(session, target);
        assertCanManageRole(session, target.role);
        if (target.status === "deactivated") {
          throw new AdminAccessError("AlreadyDeactivated", "Admin is already deactivated");
        }

        const now = clock();
        const admin = await saveAdmin(target.id, { status: "deactivated", demotedBy: session.email, demotedAt: now }, now);
        await mirrorAdminRole(admin.email, null, now);

        draft.detail = `Demoted ${admin.email}`;
        draft.metadata = { ...draft.metadata, previousRole: target.role };
        return toAdminSummary(admin);
      }
    );

    dispatchNotification("admin-demotion", demoted.email, () =>
      notifier.enqueueDemotion({
        email: demoted.email,
        fullName: demoted.fullName,
        demotedBy: session.email,
        reason: input.reason
      })
    );
    return demoted;
  }

  async function updateAdmin(session: AdminSession, adminId: string, input: AdminUpdateRequest) {
    return audit.run(
      { id: session.adminId, email: session.email },
      "update_admin",
      {
        targetType: "admin_user",
        targetId: adminId,
        targetEmail: null,
        detail: `Update admin ${adminId}`,
        metadata: { ...input }
      },
      async (draft) => {
        assertNotSelf(session, { id: adminId });
        assertPermission(session, "admin_management");

        const target = await findAdmin(adminId);
        draft.targetEmail = target.email;
        assertNotSelf(session, target);
        assertCanManageRole(session, target.role);
        if (input.role) {
          assertCanManageRole(session, input.role);
        }

        const now = clock();
        const patch: AdminUserPatch = {};
        if (input.role) {
          patch.role = input.role;
          patch.permissions = resolvePermissions(input.role);
        }
        if (input.permissions) {
          patch.permissions = normalizePermissions(input.permissions);
        }
        if (patch.permissions) {
          assertCanGrantPermissions(session, patch.permissions);
        }
        if (input.status === "deactivated" && target.status === "active") {
          patch.status = "deactivated";
          patch.demotedBy = session.email;
          patch.demotedAt = now;
        }
        if (input.status === "active" && target.status === "deactivated") {
          patch.status = "active";
          patch.demotedBy = null;
          patch.demotedAt = null;
        }

        const admin = await saveAdmin(target.id, patch, now);
        await mirrorAdminRole(admin.email, admin.status === "active" ? admin.role : null, now);

        draft.detail = `Updated ${admin.email}`;
        draft.metadata = { ...draft.metadata, role: admin.role, permissions: admin.permissions, status: admin.status };
        return toAdminSummary(admin);
      }
    );
  }

  /** Creates the first super admin from a verified platform user. */
  async function bootstrapSuperAdmin(input: { email: string }) {
    const email = input.email.toLowerCase();
    return audit.run(
      SYSTEM_ACTOR,
      "bootstrap",
      {
        targetType: "platform_user",
        targetId: null,
        targetEmail: email,
        detail: `Bootstrap super admin ${email}`,
        metadata: {}
      },
      async (draft) => {
        if ((await admins.countActive()) > 0) {
          throw new AdminAccessError("AlreadyAdmin", "An active admin already exists");
        }

        const user = await users.findByEmail(email);
        if (!user) {
          throw new AdminAccessError("UserNotFound", "User not found in the platform");
        }
        draft.targetId = user.id;
        assertEligible(user);

        const now = clock();
        const fields = {
          fullName: user.fullName,
          role: "super_admin" as const,
          permissions: [...ADMIN_PERMISSIONS],
          promotedBy: null,
          promotedAt: now
        };
        const existing = await admins.findByEmail(email);
        const admin = existing
          ? await saveAdmin(existing.id, { ...fields, status: "active", demotedBy: null, demotedAt: null }, now)
          : await admins.create({ ...fields, email }, now);
        await users.setAdminRole(user.id, admin.role, now);

        draft.metadata = { adminId: admin.id };
        return toAdminSummary(admin);
      }
    );
  }

  async function getProfile(session: AdminSession) {
    return toAdminSummary(await findAdmin(session.adminId));
  }

  async function listAdmins(query: AdminListQuery) {
    const { page, limit, ...filter } = query;
    const { rows, total } = await admins.list(filter, { skip: (page - 1) * limit, limit });
    return { admins: rows.map(toAdminSummary), ...paginate(page, limit, total) };
  }

  async function listEligibleUsers(query: EligibleUsersQuery) {
    const excludeEmails = await admins.listActiveEmails();
    const { rows, total } = await users.listEligible(
      { search: query.search, excludeEmails },
      { skip: (query.page - 1) * query.limit, limit: query.limit }
    );
    return { users: rows.map(toEligibleUserView), ...paginate(query.page, query.limit, total) };
  }

  async function listAuditLogs(query: AuditLogQuery) {
    return audit.list(query);
  }

  return {
    promoteUser,
    demoteAdmin,
    updateAdmin,
    bootstrapSuperAdmin,
    getProfile,
    listAdmins,
    listEligibleUsers,
    listAuditLogs
  };
}
