import type { Clock } from "../lib/clock.js";
import { AdminAccessError } from "../lib/errors.js";
import type { AdminUserRecord, AdminUserStore, OtpChallengeStore } from "../stores/types.js";
import { generateOtpCode, hashOtpCode, matchesOtpCode, type OtpCodeGenerator } from "../utils/otpCode.js";
import { toAdminSummary } from "./adminManagement.js";
import { dispatchNotification, type AdminNotifier } from "./notificationQueue.js";
import { issueSession, type SessionSettings } from "./session.js";

export type OtpSettings = {
  otpExpiryMinutes: number;
  otpMaxAttempts: number;
  otpLength: number;
  otpResendCooldownSeconds: number;
};

export type AdminAuthDeps = {
  admins: AdminUserStore;
  challenges: OtpChallengeStore;
  notifier: AdminNotifier;
  settings: OtpSettings & SessionSettings;
  clock: Clock;
  generateCode?: OtpCodeGenerator;
};

export type AdminAuthService = ReturnType<typeof createAdminAuthService>;

function unknownAdmin() {
  return new AdminAccessError("UnknownAdmin", "Admin account not found");
}

export function createAdminAuthService(deps: AdminAuthDeps) {
  const { admins, challenges, notifier, settings, clock } = deps;
  const generateCode = deps.generateCode ?? generateOtpCode;

  async function findActiveAdmin(email: string): Promise<AdminUserRecord> {
    const admin = await admins.findByEmail(email);
    if (!admin || admin.status !== "active") {
      throw unknownAdmin();
    }
    return admin;
  }

  async function requestOtp(rawEmail: string) {
    const email = rawEmail.toLowerCase();
    const admin = await findActiveAdmin(email);
    const now = clock();

    const latest = await challenges.findLatest(email);
    const cooldownMs = settings.otpResendCooldownSeconds * 1000;
    if (latest) {
      const elapsedMs = now.getTime() - latest.issuedAt.getTime();
      if (elapsedMs < cooldownMs) {
        throw new AdminAccessError("RateLimited", "An OTP was sent recently; wait before requesting another", {
          details: { retryAfterSeconds: Math.ceil((cooldownMs - elapsedMs) / 1000) }
        });
      }
    }

    const code = generateCode(settings.otpLength);
    await challenges.issue({
      email,
      codeHash: await hashOtpCode(code),
      issuedAt: now,
      expiresAt: new Date(now.getTime() + settings.otpExpiryMinutes * 60 * 1000),
      attemptsRemaining: settings.otpMaxAttempts
    });

    dispatchNotification("admin-otp", email, () =>
      notifier.enqueueOtp({
        email,
        fullName: admin.fullName,
        code,
        expiresInMinutes: settings.otpExpiryMinutes
      })
    );

    return { role: admin.role, expiresInSeconds: settings.otpExpiryMinutes * 60 };
  }

  async function consumeChallenge(email: string, code: string) {
    const challenge = await challenges.findLatest(email);
    if (!challenge || challenge.state === "consumed" || challenge.state === "superseded") {
      throw new AdminAccessError("NoActiveChallenge", "OTP not found; request a new code");
    }
    if (challenge.state === "exhausted") {
      throw new AdminAccessError("Exhausted", "Too many failed attempts; request a new code");
    }
    if (challenge.state === "expired") {
      throw new AdminAccessError("Expired", "OTP expired");
    }

    const now = clock();
    if (now.getTime() > challenge.expiresAt.getTime()) {
      await challenges.close(challenge.id, "expired", now);
      throw new AdminAccessError("Expired", "OTP expired");
    }

    if (!(await matchesOtpCode(code, challenge.codeHash))) {
      const updated = await challenges.recordFailedAttempt(challenge.id, now);
      if (!updated) {
        throw new AdminAccessError("NoActiveChallenge", "OTP not found; request a new code");
      }
      throw new AdminAccessError("InvalidCode", "Invalid OTP", {
        details: { attemptsRemaining: updated.attemptsRemaining }
      });
    }

    if (!(await challenges.close(challenge.id, "consumed", now))) {
      throw new AdminAccessError("NoActiveChallenge", "OTP not found; request a new code");
    }
    return now;
  }

  async function verifyOtp(rawEmail: string, code: string) {
    const email = rawEmail.toLowerCase();
    const now = await consumeChallenge(email, code);

    // Status may have changed while the code was outstanding.
    const admin = await admins.findByEmail(email);
    if (!admin) {
      throw unknownAdmin();
    }
    if (admin.status !== "active") {
      throw new AdminAccessError("PermissionDenied", "Admin access denied");
    }
    await admins.recordLogin(admin.id, now);

    const session = issueSession(admin, settings, now);
    return {
      token: session.token,
      expiresAt: session.expiresAt,
      admin: toAdminSummary({ ...admin, lastLoginAt: now, loginCount: admin.loginCount + 1 })
    };
  }

  return { requestOtp, verifyOtp };
}
