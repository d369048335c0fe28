import { z } from "zod";
import { env } from "../config/env.js";
import { createAppContext, settingsFromEnv } from "../context.js";
import { connectDatabase, disconnectDatabase } from "../db/connect.js";
import { errorMessage } from "../lib/errors.js";
import { createQueueNotifier } from "../services/notificationQueue.js";
import { createMongoStores } from "../stores/mongo.js";

const emailSchema = z.string().email();

async function main() {
  const parsed = emailSchema.safeParse(process.argv[2]);
  if (!parsed.success) {
    console.error("[bootstrap-admin] usage: bootstrap-admin <email of a KYC-verified platform user>");
    process.exitCode = 1;
    return;
  }

  await connectDatabase();
  const notifier = createQueueNotifier(undefined);
  try {
    const context = createAppContext({ stores: createMongoStores(), notifier, settings: settingsFromEnv(env) });
    const admin = await context.management.bootstrapSuperAdmin({ email: parsed.data });
    console.log("[bootstrap-admin] super admin created", { id: admin.id, email: admin.email });
  } finally {
    await notifier.close();
    await disconnectDatabase();
  }
}

main().catch((error) => {
  console.error("[bootstrap-admin] failed", errorMessage(error));
  process.exit(1);
});
