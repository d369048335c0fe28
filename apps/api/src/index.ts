import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { createAppContext, settingsFromEnv } from "./context.js";
import { connectDatabase } from "./db/connect.js";
import { createQueueNotifier } from "./services/notificationQueue.js";
import { createMongoStores } from "./stores/mongo.js";

await connectDatabase();

const notifier = createQueueNotifier(env.REDIS_URL);
if (!env.REDIS_URL) {
  console.warn("[api] REDIS_URL not set; admin notifications will not be delivered");
}

const context = createAppContext({
  stores: createMongoStores(),
  notifier,
  settings: settingsFromEnv(env)
});

const app = createApp(context);
app.listen(env.PORT, () => {
  console.log(`[api] running on http://localhost:${env.PORT}`);
});
