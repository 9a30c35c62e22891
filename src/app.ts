import express from "express";
import cors, { CorsOptions } from "cors";
import helmet from "helmet";
import { createCodegenRouter, CodegenRouterDeps } from "./routes/codegen";
import { DatabaseHealth } from "./db/database-manager";

export interface AppDeps extends CodegenRouterDeps {
  corsOrigins: string[];
  healthCheck?: () => Promise<DatabaseHealth>;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  const corsOptions: CorsOptions = {
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Requests without an Origin header (curl, same-origin) are allowed
      if (!origin) return callback(null, true);

      if (deps.corsOrigins.includes(origin)) {
        return callback(null, true);
      }

      console.log("❌ CORS blocked:", origin);
      return callback(new Error("Not allowed by CORS"));
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Accept"],
    exposedHeaders: ["Content-Disposition"], // file downloads
  };

  app.use(cors(corsOptions));
  app.use(helmet());
  app.use(express.json({ limit: "10mb" }));

  // Request logging
  app.use((req, _res, next) => {
    console.log(`Incoming request: ${req.method} ${req.path}`);
    next();
  });

  app.use("/api/v1/codegen", createCodegenRouter(deps));

  app.get("/api/v1/health", async (_req, res) => {
    if (!deps.healthCheck) {
      return res.json({ service: "PhaseGen Backend", status: "healthy", timestamp: new Date().toISOString() });
    }

    const health = await deps.healthCheck();
    res.status(health.status === "healthy" ? 200 : 503).json({
      service: "PhaseGen Backend",
      ...health,
      uptime: process.uptime(),
    });
  });

  app.get("/", (_req, res) => {
    res.status(200).json({
      status: "ok",
      service: "PhaseGen Backend",
      timestamp: new Date().toISOString(),
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Endpoint not found" });
  });

  // Error handling middleware
  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      console.error("Error:", err);
      res.status(500).json({ success: false, error: "Internal server error" });
    }
  );

  return app;
}
