import type { AdminPermission } from "@admin-access/shared-types";
import type { NextFunction, Request, Response } from "express";
import type { Clock } from "../lib/clock.js";
import { AdminAccessError } from "../lib/errors.js";
import { assertPermission, type AdminSession } from "../services/accessControl.js";
import { verifySession, type SessionSettings } from "../services/session.js";

export type AuthRequest = Request & { admin?: AdminSession };

function parseBearerToken(authorizationHeader?: string) {
  if (!authorizationHeader || !authorizationHeader.startsWith("Bearer ")) {
    return null;
  }
  return authorizationHeader.slice("Bearer ".length);
}

/** The verified session attached by `requireSession`, passed explicitly into services. */
export function sessionOf(req: AuthRequest): AdminSession {
  if (!req.admin) {
    throw new AdminAccessError("InvalidCredential", "Admin authentication required");
  }
  return req.admin;
}

export function createAuthMiddleware(settings: SessionSettings, clock: Clock) {
  function requireSession(req: AuthRequest, _res: Response, next: NextFunction) {
    const token = parseBearerToken(req.header("authorization"));
    if (!token) {
      next(new AdminAccessError("InvalidCredential", "Admin authentication required"));
      return;
    }

    try {
      req.admin = verifySession(token, settings, clock());
      next();
    } catch (error) {
      next(error);
    }
  }

  function requirePermission(permission: AdminPermission) {
    return (req: AuthRequest, _res: Response, next: NextFunction) => {
      try {
        assertPermission(sessionOf(req), permission);
        next();
      } catch (error) {
        next(error);
      }
    };
  }

  return { requireSession, requirePermission };
}
