import { z } from "zod";

export const ADMIN_ROLES = ["super_admin", "admin", "moderator", "support"] as const;

export const ADMIN_PERMISSIONS = [
  "user_management",
  "admin_management",
  "content_moderation",
  "service_approval",
  "payment_management",
  "refund_processing",
  "analytics_access",
  "report_generation",
  "system_configuration",
  "email_management",
  "kyc_verification",
  "kyc_approval"
] as const;

export const adminRoleSchema = z.enum(ADMIN_ROLES);
export const adminPermissionSchema = z.enum(ADMIN_PERMISSIONS);
export const adminStatusSchema = z.enum(["active", "deactivated"]);
export const kycStatusSchema = z.enum(["pending", "verified", "failed"]);

export const adminSessionClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email(),
  role: adminRoleSchema,
  permissions: z.array(adminPermissionSchema),
  type: z.literal("admin"),
  iat: z.number().int(),
  exp: z.number().int()
});

export const adminOtpRequestSchema = z.object({
  email: z.string().email()
});

export const adminOtpVerifySchema = z.object({
  email: z.string().email(),
  otp: z.string().regex(/^\d{4,10}$/, "OTP must be numeric")
});

export const promoteUserSchema = z.object({
  user_id: z.string().min(1),
  role: adminRoleSchema,
  permissions: z.array(adminPermissionSchema).optional()
});

export const demoteAdminSchema = z.object({
  reason: z.string().max(240).optional()
});

export const adminUpdateSchema = z
  .object({
    role: adminRoleSchema.optional(),
    permissions: z.array(adminPermissionSchema).optional(),
    status: adminStatusSchema.optional()
  })
  .refine((value) => value.role !== undefined || value.permissions !== undefined || value.status !== undefined, {
    message: "Provide role, permissions or status"
  });

const pageSchema = z.coerce.number().int().min(1).default(1);
const limitSchema = z.coerce.number().int().min(1).max(100).default(20);

export const eligibleUsersQuerySchema = z.object({
  search: z.string().trim().min(1).optional(),
  page: pageSchema,
  limit: limitSchema
});

export const adminListQuerySchema = z.object({
  status: adminStatusSchema.optional(),
  role: adminRoleSchema.optional(),
  page: pageSchema,
  limit: limitSchema
});

export const auditOutcomeSchema = z.enum(["success", "failure"]);

export const auditLogQuerySchema = z.object({
  actor: z.string().trim().min(1).optional(),
  action: z.string().trim().min(1).optional(),
  targetId: z.string().trim().min(1).optional(),
  outcome: auditOutcomeSchema.optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  page: pageSchema,
  limit: z.coerce.number().int().min(1).max(200).default(50)
});

export type AdminRole = z.infer<typeof adminRoleSchema>;
export type AdminPermission = z.infer<typeof adminPermissionSchema>;
export type AdminStatus = z.infer<typeof adminStatusSchema>;
export type KycStatus = z.infer<typeof kycStatusSchema>;
export type AdminSessionClaims = z.infer<typeof adminSessionClaimsSchema>;
export type AdminOtpRequest = z.infer<typeof adminOtpRequestSchema>;
export type AdminOtpVerifyRequest = z.infer<typeof adminOtpVerifySchema>;
export type PromoteUserRequest = z.infer<typeof promoteUserSchema>;
export type DemoteAdminRequest = z.infer<typeof demoteAdminSchema>;
export type AdminUpdateRequest = z.infer<typeof adminUpdateSchema>;
export type EligibleUsersQuery = z.infer<typeof eligibleUsersQuerySchema>;
export type AdminListQuery = z.infer<typeof adminListQuerySchema>;
export type AuditOutcome = z.infer<typeof auditOutcomeSchema>;
export type AuditLogQuery = z.infer<typeof auditLogQuerySchema>;

export const adminOtpNotificationSchema = z.object({
  email: z.string().email(),
  fullName: z.string().optional(),
  code: z.string().min(1),
  expiresInMinutes: z.number().int().positive()
});

export const adminPromotionNotificationSchema = z.object({
  email: z.string().email(),
  fullName: z.string(),
  role: adminRoleSchema,
  permissions: z.array(adminPermissionSchema),
  promotedBy: z.string()
});

export const adminDemotionNotificationSchema = z.object({
  email: z.string().email(),
  fullName: z.string(),
  demotedBy: z.string(),
  reason: z.string().optional()
});

export type AdminOtpNotificationPayload = z.infer<typeof adminOtpNotificationSchema>;
export type AdminPromotionNotificationPayload = z.infer<typeof adminPromotionNotificationSchema>;
export type AdminDemotionNotificationPayload = z.infer<typeof adminDemotionNotificationSchema>;

export const NOTIFICATION_QUEUE_NAME = "admin-access-notifications";
