import mongoose from "mongoose";
import { env } from "../config/env.js";

let isConnected = false;

// Queries run inside `connection.transaction()` pick up its session without passing it around.
mongoose.set("transactionAsyncLocalStorage", true);

export async function connectDatabase() {
  if (isConnected) {
    return;
  }

  await mongoose.connect(env.MONGODB_URI, {
    dbName: env.MONGODB_DB_NAME,
    serverSelectionTimeoutMS: 15000,
    tls: env.MONGODB_TLS,
    family: 4
  });
  isConnected = true;
  console.log("[api] connected to MongoDB", { dbName: env.MONGODB_DB_NAME });
}

export async function disconnectDatabase() {
  if (!isConnected) {
    return;
  }
  await mongoose.disconnect();
  isConnected = false;
}
