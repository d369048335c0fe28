import { Router } from "express";
import type { AppContext } from "./context.js";
import { createAdminRouter } from "./modules/admin.js";
import { createAdminAuthRouter } from "./modules/adminAuth.js";

export function createRouter(context: AppContext) {
  const router = Router();

  router.use("/admin/auth", createAdminAuthRouter(context.auth));
  router.use("/admin", createAdminRouter(context));

  return router;
}
