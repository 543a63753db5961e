import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import type { AppConfig } from "./config";
import { createRoomsRouter } from "./routes/rooms";
import type { RoundController } from "./services/roundController";
import type { SessionRegistry } from "./services/sessionRegistry";

export function createApp(
  config: AppConfig,
  registry: SessionRegistry,
  controller: RoundController,
): express.Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(
    cors({
      origin: config.frontendUrl,
      credentials: true,
    }),
  );
  app.use(morgan("combined"));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check endpoint
  app.get("/api/health", (req, res) => {
    res.json({
      status: "OK",
      timestamp: new Date().toISOString(),
      message: "Podseat backend is running",
    });
  });

  app.use(
    "/api/rooms",
    createRoomsRouter(registry, controller, { sessionTtlMs: config.sessionTtlMs }),
  );

  // 404 handler
  app.use("*", (req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  // Error handling middleware
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction,
    ) => {
      console.error(err.stack);
      res.status(500).json({
        error: "Something went wrong!",
        message: config.nodeEnv === "development" ? err.message : "Internal server error",
      });
    },
  );

  return app;
}
