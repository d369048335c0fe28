import { adminSessionClaimsSchema, type AdminPermission, type AdminSessionClaims } from "@admin-access/shared-types";
import jwt from "jsonwebtoken";
import { AdminAccessError } from "../lib/errors.js";
import type { AdminUserRecord } from "../stores/types.js";
import { assertPermission, normalizePermissions, type AdminSession } from "./accessControl.js";

export type SessionSettings = {
  jwtSecret: string;
  sessionTtlMinutes: number;
};

export type IssuedSession = {
  token: string;
  expiresAt: Date;
};

function toEpochSeconds(date: Date) {
  return Math.floor(date.getTime() / 1000);
}

export function issueSession(
  admin: Pick<AdminUserRecord, "id" | "email" | "role" | "permissions">,
  settings: SessionSettings,
  now: Date
): IssuedSession {
  const iat = toEpochSeconds(now);
  const exp = iat + settings.sessionTtlMinutes * 60;
  const claims: AdminSessionClaims = {
    sub: admin.id,
    email: admin.email,
    role: admin.role,
    permissions: normalizePermissions(admin.permissions),
    type: "admin",
    iat,
    exp
  };

  return {
    token: jwt.sign(claims, settings.jwtSecret, { algorithm: "HS256" }),
    expiresAt: new Date(exp * 1000)
  };
}

function decodeToken(token: string, settings: SessionSettings, now: Date) {
  try {
    return jwt.verify(token, settings.jwtSecret, {
      algorithms: ["HS256"],
      clockTimestamp: toEpochSeconds(now)
    });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new AdminAccessError("Expired", "Session expired", { statusCode: 401 });
    }
    throw new AdminAccessError("InvalidCredential", "Invalid session token", { cause: error });
  }
}

/** Checks signature, expiry and claim shape. Never reads the admin store. */
export function verifySession(token: string, settings: SessionSettings, now: Date): AdminSession {
  const parsed = adminSessionClaimsSchema.safeParse(decodeToken(token, settings, now));
  if (!parsed.success) {
    throw new AdminAccessError("InvalidCredential", "Invalid session token");
  }

  return {
    adminId: parsed.data.sub,
    email: parsed.data.email,
    role: parsed.data.role,
    permissions: parsed.data.permissions
  };
}

export function authorize(token: string, permission: AdminPermission, settings: SessionSettings, now: Date) {
  const session = verifySession(token, settings, now);
  assertPermission(session, permission);
  return session;
}
