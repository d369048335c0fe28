import type {
  AdminDemotionNotificationPayload,
  AdminOtpNotificationPayload,
  AdminPermission,
  AdminPromotionNotificationPayload,
  AdminRole,
  KycStatus
} from "@admin-access/shared-types";
import { createAppContext, type AccessSettings } from "../../src/context.js";
import type { Clock } from "../../src/lib/clock.js";
import { resolvePermissions } from "../../src/services/accessControl.js";
import type { AdminNotifier, EnqueueResult } from "../../src/services/notificationQueue.js";
import type { AdminUserRecord, PlatformUserRecord } from "../../src/stores/types.js";
import { newId } from "../../src/utils/ids.js";
import { createMemoryStores, type MemoryStores } from "./memoryStores.js";

export const testSettings: AccessSettings = {
  jwtSecret: "test-secret-for-admin-sessions",
  sessionTtlMinutes: 60,
  otpExpiryMinutes: 10,
  otpMaxAttempts: 3,
  otpLength: 6,
  otpResendCooldownSeconds: 60
};

export type TestClock = Clock & { advance(ms: number): void; set(date: Date): void };

export function createTestClock(start = new Date("2026-03-02T09:00:00.000Z")): TestClock {
  let current = start.getTime();
  const clock = () => new Date(current);
  return Object.assign(clock, {
    advance(ms: number) {
      current += ms;
    },
    set(date: Date) {
      current = date.getTime();
    }
  });
}

export const minutes = (count: number) => count * 60 * 1000;
export const seconds = (count: number) => count * 1000;

/** Hands out the queued codes in order, then falls back to a fixed code. */
export function createCodeQueue(...codes: string[]) {
  const pending = [...codes];
  return (_length: number) => pending.shift() ?? "999999";
}

export type RecordingNotifier = AdminNotifier & {
  otps: AdminOtpNotificationPayload[];
  promotions: AdminPromotionNotificationPayload[];
  demotions: AdminDemotionNotificationPayload[];
};

export function createRecordingNotifier(result: EnqueueResult = { enqueued: true }): RecordingNotifier {
  const otps: AdminOtpNotificationPayload[] = [];
  const promotions: AdminPromotionNotificationPayload[] = [];
  const demotions: AdminDemotionNotificationPayload[] = [];

  return {
    otps,
    promotions,
    demotions,
    async enqueueOtp(payload) {
      otps.push(payload);
      return result;
    },
    async enqueuePromotion(payload) {
      promotions.push(payload);
      return result;
    },
    async enqueueDemotion(payload) {
      demotions.push(payload);
      return result;
    }
  };
}

export function seedPlatformUser(
  stores: MemoryStores,
  input: { email: string; fullName?: string; kycStatus?: KycStatus; activeViolations?: number; createdAt?: Date }
): PlatformUserRecord {
  const user: PlatformUserRecord = {
    id: newId(),
    email: input.email,
    fullName: input.fullName ?? input.email.split("@")[0],
    kycStatus: input.kycStatus ?? "verified",
    activeViolations: input.activeViolations ?? 0,
    adminRole: null,
    createdAt: input.createdAt ?? new Date("2026-01-15T12:00:00.000Z")
  };
  stores.users.add(user);
  return user;
}

export async function seedAdmin(
  stores: MemoryStores,
  input: { email: string; role: AdminRole; fullName?: string; permissions?: AdminPermission[] },
  now = new Date("2026-02-01T08:00:00.000Z")
): Promise<AdminUserRecord> {
  return stores.admins.create(
    {
      email: input.email,
      fullName: input.fullName ?? input.email.split("@")[0],
      role: input.role,
      permissions: input.permissions ?? resolvePermissions(input.role),
      promotedBy: null,
      promotedAt: now
    },
    now
  );
}

export function createTestContext(options: { codes?: string[]; clock?: TestClock; notifier?: RecordingNotifier } = {}) {
  const stores = createMemoryStores();
  const clock = options.clock ?? createTestClock();
  const notifier = options.notifier ?? createRecordingNotifier();
  const context = createAppContext({
    stores,
    notifier,
    settings: testSettings,
    clock,
    generateCode: createCodeQueue(...(options.codes ?? []))
  });
  return { stores, clock, notifier, context };
}

/** Lets fire-and-forget notification dispatches settle. */
export async function flushNotifications() {
  await new Promise((resolve) => setImmediate(resolve));
}
