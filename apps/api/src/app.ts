import cors from "cors";
import express from "express";
import helmet from "helmet";
import morgan from "morgan";
import type { AppContext } from "./context.js";
import { AdminAccessError, errorMessage } from "./lib/errors.js";
import { createRouter } from "./router.js";

export function createApp(context: AppContext) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: process.env.CORS_ORIGIN?.split(",") ?? "*" }));
  app.use(express.json({ limit: "100kb" }));
  if (process.env.NODE_ENV !== "test") {
    app.use(morgan("dev"));
  }

  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", service: "api", timestamp: context.clock().toISOString() });
  });

  app.use("/api/v1", createRouter(context));

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof AdminAccessError) {
      if (err.statusCode >= 500) {
        console.error("[api] request failed", {
          code: err.code,
          message: err.message,
          cause: err.cause === undefined ? undefined : errorMessage(err.cause)
        });
      }
      res.status(err.statusCode).json({
        message: err.message,
        code: err.code,
        ...(err.details ? { details: err.details } : {})
      });
      return;
    }

    if (err instanceof SyntaxError) {
      res.status(400).json({ message: "Malformed JSON body" });
      return;
    }

    console.error("[api] unhandled error", err);
    res.status(500).json({ message: "Internal server error" });
  });

  return app;
}
