import http from "http";
import { createApp } from "./app";
import { getAppConfig } from "./config/app-config";
import { CodegenConfigStore } from "./config/codegen-config";
import { createDatabase } from "./db/knex";
import { DatabaseManager } from "./db/database-manager";
import { PhaseActivationsTable } from "./db/tables/phaseActivations";
import { CodeGenerationService } from "./services/codeGenerationService";

// Startup function with database checks
async function startServer() {
  const config = getAppConfig();

  try {
    console.log("🚀 Starting PhaseGen Backend...");

    const db = createDatabase(config.environment);
    const databaseManager = new DatabaseManager(db);
    const configStore = await CodegenConfigStore.load(config.codegen.configFile);
    const service = new CodeGenerationService(new PhaseActivationsTable(db), configStore);

    const isDbHealthy = await databaseManager.testConnection();
    if (isDbHealthy) {
      await databaseManager.runMigrations();
    } else {
      console.warn("⚠️ Database connection failed. Continuing startup without DB.");
    }

    const app = createApp({
      service,
      configStore,
      outputRoot: config.codegen.outputDir,
      corsOrigins: config.corsOrigins,
      healthCheck: () => databaseManager.healthCheck(),
    });
    const server = http.createServer(app);

    const shutdown = () => {
      console.log("🔄 Shutting down...");
      server.close(() => {
        databaseManager
          .closeConnection()
          .then(() => process.exit(0))
          .catch(() => process.exit(1));
      });
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    server.listen({ port: config.port, host: "0.0.0.0" }, () => {
      console.log(`✅ Server is running on http://localhost:${config.port}`);
      console.log(`🌍 Environment: ${config.environment}`);
      console.log(`📁 Output directory: ${config.codegen.outputDir}`);
      console.log(`📊 Health check: http://localhost:${config.port}/api/v1/health`);
    });
  } catch (error) {
    console.error("❌ Failed to start server:", error);
    process.exit(1);
  }
}

startServer().catch((error) => {
  console.error("❌ Server startup failed:", error);
  process.exit(1);
});

process.on("unhandledRejection", (reason, promise) => {
  console.error("Unhandled Rejection at:", promise, "reason:", reason);
});
