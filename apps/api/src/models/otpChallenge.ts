import { Schema, model, type InferSchemaType, type Types } from "mongoose";
import { OTP_CHALLENGE_STATES } from "../stores/types.js";

const TERMINAL_RETENTION_SECONDS = 24 * 60 * 60;

const otpChallengeSchema = new Schema(
  {
    email: { type: String, required: true, lowercase: true },
    codeHash: { type: String, required: true },
    issuedAt: { type: Date, required: true },
    expiresAt: { type: Date, required: true },
    attemptsRemaining: { type: Number, required: true, min: 0 },
    state: { type: String, enum: [...OTP_CHALLENGE_STATES], default: "pending" },
    closedAt: { type: Date, default: null }
  },
  { timestamps: true }
);

otpChallengeSchema.index({ email: 1, issuedAt: -1 });
// One pending challenge per email; a concurrent second issuance fails on this index.
otpChallengeSchema.index({ email: 1 }, { unique: true, partialFilterExpression: { state: "pending" } });
otpChallengeSchema.index({ expiresAt: 1 }, { expireAfterSeconds: TERMINAL_RETENTION_SECONDS });

export type OtpChallengeDocument = InferSchemaType<typeof otpChallengeSchema>;
export type LeanOtpChallenge = OtpChallengeDocument & { _id: Types.ObjectId };
export const OtpChallengeModel = model("OtpChallenge", otpChallengeSchema);
