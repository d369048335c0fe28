import { ADMIN_ROLES } from "@admin-access/shared-types";
import { Schema, model, type InferSchemaType, type Types } from "mongoose";

const platformUserSchema = new Schema(
  {
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    fullName: { type: String, required: true },
    kycStatus: { type: String, enum: ["pending", "verified", "failed"], default: "pending", index: true },
    activeViolations: { type: Number, default: 0, min: 0 },
    adminRole: { type: String, enum: [...ADMIN_ROLES, null], default: null }
  },
  { timestamps: true }
);

export type PlatformUserDocument = InferSchemaType<typeof platformUserSchema>;
export type LeanPlatformUser = PlatformUserDocument & { _id: Types.ObjectId; createdAt: Date };
export const PlatformUserModel = model("PlatformUser", platformUserSchema, "users");
