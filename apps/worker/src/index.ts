import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import {
  NOTIFICATION_QUEUE_NAME,
  adminDemotionNotificationSchema,
  adminOtpNotificationSchema,
  adminPromotionNotificationSchema
} from "@admin-access/shared-types";
import { Worker } from "bullmq";
import { Redis } from "ioredis";
import nodemailer from "nodemailer";
import { renderDemotionEmail, renderOtpEmail, renderPromotionEmail, type EmailContent } from "./templates.js";

const currentFile = fileURLToPath(import.meta.url);
const currentDir = path.dirname(currentFile);
dotenv.config({ path: path.resolve(process.cwd(), ".env") });
dotenv.config({ path: path.resolve(currentDir, "../../../.env") });

const redisUrl = process.env.REDIS_URL;
if (!redisUrl) {
  throw new Error("REDIS_URL is required for worker startup");
}
const connection = new Redis(redisUrl, {
  maxRetriesPerRequest: null
});

function createTransporter() {
  const host = process.env.SMTP_HOST;
  const port = process.env.SMTP_PORT ? Number(process.env.SMTP_PORT) : undefined;
  const secure = (process.env.SMTP_SECURE ?? "true").toLowerCase() === "true";
  const user = process.env.SMTP_USER;
  const pass = process.env.SMTP_PASS;

  if (!host || !port || !user || !pass) {
    return null;
  }

  return nodemailer.createTransport({
    host,
    port,
    secure,
    auth: {
      user,
      pass
    }
  });
}

const transporter = createTransporter();
const fromAddress = process.env.EMAIL_FROM ?? "Admin Access <no-reply@example.com>";

async function deliver(to: string, content: EmailContent, context: Record<string, unknown>) {
  if (!transporter) {
    console.warn("[worker][notify] SMTP not configured. Logging notification instead.", {
      to,
      subject: content.subject,
      ...context
    });
    return;
  }

  await transporter.sendMail({
    from: fromAddress,
    to,
    subject: content.subject,
    text: content.text,
    html: content.html
  });

  console.log("[worker][notify] email sent", { to, subject: content.subject, ...context });
}

const worker = new Worker(
  NOTIFICATION_QUEUE_NAME,
  async (job) => {
    if (job.name === "admin-otp") {
      const payload = adminOtpNotificationSchema.parse(job.data);
      // The code itself stays out of the log when SMTP is configured.
      await deliver(payload.email, renderOtpEmail(payload), transporter ? {} : { code: payload.code });
      return;
    }

    if (job.name === "admin-promotion") {
      const payload = adminPromotionNotificationSchema.parse(job.data);
      await deliver(payload.email, renderPromotionEmail(payload), { role: payload.role });
      return;
    }

    if (job.name === "admin-demotion") {
      const payload = adminDemotionNotificationSchema.parse(job.data);
      await deliver(payload.email, renderDemotionEmail(payload), { demotedBy: payload.demotedBy });
      return;
    }

    console.log("[worker] skipped unknown job", job.name);
  },
  { connection }
);

worker.on("failed", (job, error) => {
  console.error("[worker][notify] job failed", { job: job?.name, attempts: job?.attemptsMade, error: error.message });
});

console.log("[worker] listening for admin notifications", { queue: NOTIFICATION_QUEUE_NAME });
