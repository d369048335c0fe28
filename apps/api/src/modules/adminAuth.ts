import { Router } from "express";
import { adminOtpRequestSchema, adminOtpVerifySchema } from "@admin-access/shared-types";
import type { AdminAuthService } from "../services/adminAuth.js";

export function createAdminAuthRouter(auth: AdminAuthService) {
  const adminAuthRouter = Router();

  adminAuthRouter.post("/request-otp", async (req, res, next) => {
    const parsed = adminOtpRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid OTP request", issues: parsed.error.issues });
      return;
    }

    try {
      const result = await auth.requestOtp(parsed.data.email);
      res.status(202).json({ message: "OTP sent to email", role: result.role, expiresIn: result.expiresInSeconds });
    } catch (error) {
      next(error);
    }
  });

  adminAuthRouter.post("/verify-otp", async (req, res, next) => {
    const parsed = adminOtpVerifySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid OTP verification request", issues: parsed.error.issues });
      return;
    }

    try {
      const result = await auth.verifyOtp(parsed.data.email, parsed.data.otp);
      res.json({ message: "Admin login successful", ...result });
    } catch (error) {
      next(error);
    }
  });

  return adminAuthRouter;
}
