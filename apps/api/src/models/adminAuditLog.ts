import { Schema, model, type InferSchemaType, type Types } from "mongoose";

const adminAuditLogSchema = new Schema(
  {
    actorId: { type: String, required: true, index: true },
    actorEmail: { type: String, required: true, index: true },
    action: { type: String, required: true, index: true },
    targetType: { type: String, required: true },
    targetId: { type: String, default: null, index: true },
    targetEmail: { type: String, default: null },
    outcome: { type: String, enum: ["success", "failure"], required: true },
    detail: { type: String, required: true },
    metadata: { type: Schema.Types.Mixed, default: {} }
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

adminAuditLogSchema.index({ createdAt: -1 });
adminAuditLogSchema.pre(
  [
    "updateOne",
    "updateMany",
    "findOneAndUpdate",
    "replaceOne",
    "findOneAndReplace",
    "deleteOne",
    "deleteMany",
    "findOneAndDelete"
  ],
  function rejectMutation() {
    throw new Error("Audit log entries are append-only");
  }
);

export type AdminAuditLogDocument = InferSchemaType<typeof adminAuditLogSchema>;
export type LeanAdminAuditLog = AdminAuditLogDocument & { _id: Types.ObjectId; createdAt: Date };
export const AdminAuditLogModel = model("AdminAuditLog", adminAuditLogSchema);
