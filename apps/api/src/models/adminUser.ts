import { ADMIN_PERMISSIONS, ADMIN_ROLES } from "@admin-access/shared-types";
import { Schema, model, type InferSchemaType, type Types } from "mongoose";

const adminUserSchema = new Schema(
  {
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    fullName: { type: String, required: true },
    role: { type: String, enum: [...ADMIN_ROLES], required: true, index: true },
    permissions: { type: [{ type: String, enum: [...ADMIN_PERMISSIONS] }], default: [] },
    status: { type: String, enum: ["active", "deactivated"], default: "active", index: true },
    promotedBy: { type: String, default: null },
    promotedAt: { type: Date, required: true },
    demotedBy: { type: String, default: null },
    demotedAt: { type: Date, default: null },
    lastLoginAt: { type: Date, default: null },
    loginCount: { type: Number, default: 0 }
  },
  { timestamps: true }
);

export type AdminUserDocument = InferSchemaType<typeof adminUserSchema>;
export type LeanAdminUser = AdminUserDocument & { _id: Types.ObjectId; createdAt: Date; updatedAt: Date };
export const AdminUserModel = model("AdminUser", adminUserSchema);
