import {
  NOTIFICATION_QUEUE_NAME,
  type AdminDemotionNotificationPayload,
  type AdminOtpNotificationPayload,
  type AdminPromotionNotificationPayload
} from "@admin-access/shared-types";
import { Queue } from "bullmq";
import { Redis } from "ioredis";
import { AdminAccessError, errorMessage } from "../lib/errors.js";

export type EnqueueResult = { enqueued: true } | { enqueued: false; reason: string };

export interface AdminNotifier {
  enqueueOtp(payload: AdminOtpNotificationPayload): Promise<EnqueueResult>;
  enqueuePromotion(payload: AdminPromotionNotificationPayload): Promise<EnqueueResult>;
  enqueueDemotion(payload: AdminDemotionNotificationPayload): Promise<EnqueueResult>;
}

export type QueueNotifier = AdminNotifier & { close(): Promise<void> };

export function createQueueNotifier(redisUrl: string | undefined): QueueNotifier {
  let connection: Redis | null = null;
  let queue: Queue | null = null;

  function getQueue() {
    if (!redisUrl) {
      return null;
    }

    if (queue) {
      return queue;
    }

    connection = new Redis(redisUrl, {
      maxRetriesPerRequest: null
    });
    queue = new Queue(NOTIFICATION_QUEUE_NAME, { connection });
    return queue;
  }

  async function enqueue(name: string, payload: object, attempts: number): Promise<EnqueueResult> {
    const notificationQueue = getQueue();
    if (!notificationQueue) {
      return { enqueued: false, reason: "REDIS_URL not set" };
    }

    await notificationQueue.add(name, payload, {
      attempts,
      backoff: { type: "exponential", delay: 2000 },
      removeOnComplete: true,
      removeOnFail: false
    });

    return { enqueued: true };
  }

  return {
    enqueueOtp: (payload) => enqueue("admin-otp", payload, 3),
    enqueuePromotion: (payload) => enqueue("admin-promotion", payload, 5),
    enqueueDemotion: (payload) => enqueue("admin-demotion", payload, 5),
    async close() {
      await queue?.close();
      connection?.disconnect();
      queue = null;
      connection = null;
    }
  };
}

/**
 * Hands a notification to the queue without holding up the caller. A failed
 * dispatch is logged as degraded mode; the operation that triggered it stands.
 */
export function dispatchNotification(kind: string, email: string, send: () => Promise<EnqueueResult>) {
  void send()
    .then((result) => {
      if (!result.enqueued) {
        console.warn("[api][notify] notification not queued", { kind, email, reason: result.reason });
      }
    })
    .catch((error: unknown) => {
      const failure = new AdminAccessError("NotificationFailure", `Failed to queue ${kind} notification`, { cause: error });
      console.warn("[api][notify] degraded mode", {
        kind,
        email,
        code: failure.code,
        message: failure.message,
        cause: errorMessage(error)
      });
    });
}
