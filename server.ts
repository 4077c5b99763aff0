import "dotenv/config";
import express from "express";
import cors from "cors";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { loadConfig, isProduction } from "./src/config.js";
import type { AppConfig } from "./src/config.js";
import { createServices } from "./src/app-services.js";
import type { AppServices } from "./src/app-services.js";
import { runMigrations } from "./src/db/run-migrations.js";
import { loadInitialPlan, refreshPlanFromDatabase } from "./src/helpers/plan-helpers.js";
import { getSettings, listUsersForScheduling } from "./src/helpers/settings-helpers.js";
import { DailyTrigger } from "./src/scheduler/daily-trigger.js";

import { registerApiTool } from "./src/tools/api.js";
import { registerContextTool } from "./src/tools/context.js";
import { registerTodayPlanTool } from "./src/tools/today-plan.js";
import { registerCycleTools } from "./src/tools/cycle.js";
import { registerProgressionTools } from "./src/tools/progression.js";
import { registerAutoprogTools } from "./src/tools/autoprog.js";
import { registerDayLogTools } from "./src/tools/day-log.js";
import { registerRemindersTool } from "./src/tools/reminders.js";
import { registerBodyMeasurementsTool } from "./src/tools/body-measurements.js";
import { registerMedLogTool } from "./src/tools/med-log.js";
import { registerPlanSyncTool } from "./src/tools/plan-sync.js";

import { authenticateToken, AuthError } from "./src/auth/middleware.js";
import type { AuthenticatedUser } from "./src/auth/middleware.js";
import { runWithUser } from "./src/context/user-context.js";
import pool from "./src/db/connection.js";

const PLAN_REFRESH_INTERVAL_MS = 60_000;

function getAllowedOrigins(config: AppConfig): string[] {
  if (config.ALLOWED_ORIGINS) {
    return config.ALLOWED_ORIGINS.split(",").map(s => s.trim()).filter(Boolean);
  }
  if (!config.NODE_ENV || config.NODE_ENV === "development") {
    return ["http://localhost:3000", "http://localhost:3001", "http://localhost:5173"];
  }
  return [];
}

// New McpServer per request: stateless design means no session affinity needed.
function createConfiguredServer(services: AppServices): McpServer {
  const server = new McpServer(
    { name: "cycle-coach", version: "1.0.0" },
    {
      instructions: `You are a personal training and nutrition coach. The user follows a repeating cycle of workout and rest days with daily macro targets, and you call tools to read and adjust it.

CRITICAL: first message of every conversation:
1. Call get_context BEFORE responding to the user.
2. Follow the required_action field in the response:
   - If required_action is "sync_plan": no plan is loaded. If the user is an admin offer sync_plan, otherwise say the plan is not published yet.
   - If required_action is "set_cycle_start": ask when the cycle started and call set_cycle_start.
   - If required_action is null: respond normally (optionally follow the suggestion field).

Never skip step 1. Always get context first.

Use get_today for "what do I do today?". Progressions are free text ("+2 reps") and the newest one per exercise wins.`,
    }
  );

  registerApiTool(server, services);
  registerContextTool(server, services);
  registerTodayPlanTool(server, services);
  registerCycleTools(server, services);
  registerProgressionTools(server, services);
  registerAutoprogTools(server, services);
  registerDayLogTools(server, services);
  registerRemindersTool(server, services);
  registerBodyMeasurementsTool(server, services);
  registerMedLogTool(server, services);
  registerPlanSyncTool(server, services);

  return server;
}

async function resolveUser(config: AppConfig, req: express.Request): Promise<AuthenticatedUser> {
  if (config.DEV_USER_ID && !isProduction(config)) {
    const settings = await getSettings(config.DEV_USER_ID);
    return { userId: config.DEV_USER_ID, timezone: settings.timezone };
  }
  return authenticateToken(req);
}

function createApp(config: AppConfig, services: AppServices) {
  const app = express();
  app.set("trust proxy", 1);
  app.use(cors({
    origin: getAllowedOrigins(config),
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  }));
  app.use(express.json({ limit: "1mb" }));

  // Health check
  app.get("/health", (_req, res) => {
    const plan = services.plans.isLoaded() ? services.plans.current().version : null;
    res.json({ status: "ok", plan_version: plan });
  });

  // MCP endpoint
  app.all("/mcp", async (req, res) => {
    try {
      const user = await resolveUser(config, req);
      const context = { userId: user.userId, timezone: user.timezone ?? config.TZ_DEFAULT };

      await runWithUser(context, async () => {
        const server = createConfiguredServer(services);
        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: undefined,
        });

        res.on("close", () => {
          transport.close().catch(err => console.error("[mcp] transport close failed:", err));
          server.close().catch(err => console.error("[mcp] server close failed:", err));
        });

        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      });
    } catch (err) {
      if (err instanceof AuthError) {
        res.setHeader("WWW-Authenticate", 'Bearer realm="cycle-coach"');
        res.status(401).json({
          error: "unauthorized",
          message: err.message,
        });
        return;
      }
      console.error("[mcp] endpoint error:", err instanceof Error ? err.stack : err);
      if (!res.headersSent) {
        res.status(500).json({ error: "internal_error", message: "An unexpected error occurred" });
      }
    }
  });

  return app;
}

async function start() {
  const config = loadConfig();
  const services = createServices(config);

  await runMigrations();
  await loadInitialPlan(services.plans, config.PLAN_SEED_PATH);

  // Other instances may sync a newer plan version
  const planRefresh = setInterval(() => {
    refreshPlanFromDatabase(services.plans).catch(err => {
      console.error("[plan] Refresh failed:", err instanceof Error ? err.message : err);
    });
  }, PLAN_REFRESH_INTERVAL_MS);
  planRefresh.unref();

  // Cleanup expired tokens every 15 minutes
  const tokenCleanup = setInterval(() => {
    pool.query("DELETE FROM auth_tokens WHERE expires_at < NOW()").catch(err => {
      console.error("[auth] Token cleanup failed:", err instanceof Error ? err.message : err);
    });
  }, 15 * 60 * 1000);
  tokenCleanup.unref();

  const trigger = new DailyTrigger({
    engine: services.engine,
    clock: services.clock,
    listUsers: listUsersForScheduling,
    runTime: config.AUTOPROG_RUN_TIME,
    defaultTimezone: config.TZ_DEFAULT,
  });
  trigger.start();

  const app = createApp(config, services);
  const server = app.listen(config.PORT, () => {
    console.log(`Cycle Coach MCP server running on port ${config.PORT}`);
  });

  // Graceful shutdown handling
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Shutting down gracefully...`);
    trigger.stop();
    clearInterval(planRefresh);
    clearInterval(tokenCleanup);
    server.close(() => {
      console.log("HTTP server closed.");
      pool.end()
        .then(() => {
          console.log("Database pool closed.");
          process.exit(0);
        })
        .catch(err => {
          console.error("Error closing database pool:", err);
          process.exit(1);
        });
    });

    // Force close after 10 seconds
    setTimeout(() => {
      console.error("Forced shutdown after timeout.");
      process.exit(1);
    }, 10_000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

start().catch(err => {
  console.error("Failed to start:", err instanceof Error ? err.stack : err);
  process.exit(1);
});
