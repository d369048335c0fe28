import { systemClock, type Clock } from "./lib/clock.js";
import { createAdminAuthService, type OtpSettings } from "./services/adminAuth.js";
import { createAdminManagementService } from "./services/adminManagement.js";
import { createAuditRecorder } from "./services/audit.js";
import type { AdminNotifier } from "./services/notificationQueue.js";
import type { SessionSettings } from "./services/session.js";
import type { AdminStores } from "./stores/types.js";
import type { OtpCodeGenerator } from "./utils/otpCode.js";

export type AccessSettings = OtpSettings & SessionSettings;

export type AppContext = ReturnType<typeof createAppContext>;

export function settingsFromEnv(source: {
  JWT_SECRET: string;
  ADMIN_SESSION_TTL_MINUTES: number;
  OTP_EXPIRY_MINUTES: number;
  OTP_MAX_ATTEMPTS: number;
  OTP_LENGTH: number;
  OTP_RESEND_COOLDOWN_SECONDS: number;
}): AccessSettings {
  return {
    jwtSecret: source.JWT_SECRET,
    sessionTtlMinutes: source.ADMIN_SESSION_TTL_MINUTES,
    otpExpiryMinutes: source.OTP_EXPIRY_MINUTES,
    otpMaxAttempts: source.OTP_MAX_ATTEMPTS,
    otpLength: source.OTP_LENGTH,
    otpResendCooldownSeconds: source.OTP_RESEND_COOLDOWN_SECONDS
  };
}

export function createAppContext(deps: {
  stores: AdminStores;
  notifier: AdminNotifier;
  settings: AccessSettings;
  clock?: Clock;
  generateCode?: OtpCodeGenerator;
}) {
  const clock = deps.clock ?? systemClock;
  const audit = createAuditRecorder(deps.stores.auditLogs, clock, deps.stores.transaction);

  return {
    settings: deps.settings,
    clock,
    auth: createAdminAuthService({
      admins: deps.stores.admins,
      challenges: deps.stores.challenges,
      notifier: deps.notifier,
      settings: deps.settings,
      clock,
      generateCode: deps.generateCode
    }),
    management: createAdminManagementService({
      admins: deps.stores.admins,
      users: deps.stores.users,
      notifier: deps.notifier,
      audit,
      clock
    })
  };
}
