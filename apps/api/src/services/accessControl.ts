import { ADMIN_PERMISSIONS, type AdminPermission, type AdminRole } from "@admin-access/shared-types";
import { AdminAccessError } from "../lib/errors.js";

export type AdminSession = {
  adminId: string;
  email: string;
  role: AdminRole;
  permissions: AdminPermission[];
};

const rolePermissions: Record<AdminRole, readonly AdminPermission[]> = {
  super_admin: ADMIN_PERMISSIONS,
  admin: [
    "user_management",
    "content_moderation",
    "service_approval",
    "payment_management",
    "refund_processing",
    "analytics_access",
    "report_generation",
    "email_management",
    "kyc_verification",
    "kyc_approval"
  ],
  moderator: ["user_management", "content_moderation", "service_approval", "kyc_verification"],
  support: ["user_management", "kyc_verification", "analytics_access"]
};

export function resolvePermissions(role: AdminRole): AdminPermission[] {
  return [...rolePermissions[role]];
}

/** Deduplicates and orders a permission list the way the enumeration declares it. */
export function normalizePermissions(permissions: readonly AdminPermission[]): AdminPermission[] {
  const requested = new Set(permissions);
  return ADMIN_PERMISSIONS.filter((permission) => requested.has(permission));
}

export function hasPermission(session: Pick<AdminSession, "permissions">, permission: AdminPermission) {
  return session.permissions.includes(permission);
}

export function assertPermission(session: AdminSession, permission: AdminPermission) {
  if (!hasPermission(session, permission)) {
    throw new AdminAccessError("PermissionDenied", `Missing permission: ${permission}`, {
      details: { required: permission }
    });
  }
}

// Either one lets its holder promote admins or reconfigure the platform.
const superAdminGrants: readonly AdminPermission[] = ["admin_management", "system_configuration"];

export function assertCanGrantPermissions(session: AdminSession, permissions: readonly AdminPermission[]) {
  if (session.role === "super_admin") {
    return;
  }
  const reserved = permissions.filter((permission) => superAdminGrants.includes(permission));
  if (reserved.length > 0) {
    throw new AdminAccessError("PermissionDenied", `Only a super admin can grant ${reserved.join(", ")}`, {
      details: { permissions: reserved }
    });
  }
}

// super_admin accounts are only granted or modified by another super_admin.
export function assertCanManageRole(session: AdminSession, role: AdminRole) {
  if (role === "super_admin" && session.role !== "super_admin") {
    throw new AdminAccessError("PermissionDenied", "Only a super admin can manage super admin accounts");
  }
}
