import { Router } from "express";
import {
  adminListQuerySchema,
  adminUpdateSchema,
  auditLogQuerySchema,
  demoteAdminSchema,
  eligibleUsersQuerySchema,
  promoteUserSchema
} from "@admin-access/shared-types";
import type { AppContext } from "../context.js";
import { createAuthMiddleware, sessionOf, type AuthRequest } from "../middleware/auth.js";

export function createAdminRouter(context: AppContext) {
  const { requireSession, requirePermission } = createAuthMiddleware(context.settings, context.clock);
  const { management } = context;
  const adminRouter = Router();

  adminRouter.use(requireSession);

  adminRouter.get("/me", async (req: AuthRequest, res, next) => {
    try {
      res.json(await management.getProfile(sessionOf(req)));
    } catch (error) {
      next(error);
    }
  });

  adminRouter.get("/eligible-users", requirePermission("admin_management"), async (req: AuthRequest, res, next) => {
    const parsed = eligibleUsersQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid eligible users query", issues: parsed.error.issues });
      return;
    }

    try {
      res.json(await management.listEligibleUsers(parsed.data));
    } catch (error) {
      next(error);
    }
  });

  // Mutating routes check permissions inside the service so that denials are audited too.
  adminRouter.post("/promote-user", async (req: AuthRequest, res, next) => {
    const parsed = promoteUserSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid promotion payload", issues: parsed.error.issues });
      return;
    }

    try {
      const admin = await management.promoteUser(sessionOf(req), parsed.data);
      res.json({ message: "User promoted to admin successfully", admin });
    } catch (error) {
      next(error);
    }
  });

  adminRouter.post("/demote-admin/:id", async (req: AuthRequest, res, next) => {
    const parsed = demoteAdminSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid demotion payload", issues: parsed.error.issues });
      return;
    }

    try {
      const admin = await management.demoteAdmin(sessionOf(req), String(req.params.id), parsed.data);
      res.json({ message: "Admin demoted successfully", admin });
    } catch (error) {
      next(error);
    }
  });

  adminRouter.get("/admins", requirePermission("admin_management"), async (req: AuthRequest, res, next) => {
    const parsed = adminListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid admin list query", issues: parsed.error.issues });
      return;
    }

    try {
      res.json(await management.listAdmins(parsed.data));
    } catch (error) {
      next(error);
    }
  });

  adminRouter.patch("/admins/:id", async (req: AuthRequest, res, next) => {
    const parsed = adminUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid admin update payload", issues: parsed.error.issues });
      return;
    }

    try {
      res.json(await management.updateAdmin(sessionOf(req), String(req.params.id), parsed.data));
    } catch (error) {
      next(error);
    }
  });

  adminRouter.get("/audit-logs", requirePermission("admin_management"), async (req: AuthRequest, res, next) => {
    const parsed = auditLogQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid audit log query", issues: parsed.error.issues });
      return;
    }

    try {
      res.json(await management.listAuditLogs(parsed.data));
    } catch (error) {
      next(error);
    }
  });

  return adminRouter;
}
