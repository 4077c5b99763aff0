import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppServices } from "../app-services.js";
import { getPlanHistory, syncPlan } from "../api/handlers.js";
import { toolResponse, safeHandler } from "../helpers/tool-response.js";

export function registerPlanSyncTool(server: McpServer, services: AppServices) {
  server.registerTool(
    "sync_plan",
    {
      title: "Sync Plan",
      description: `Admin only. Rebuild the plan from the spreadsheet (PLAN, MACROS and CYCLE tabs) and activate it as a new version.
If any row is invalid nothing changes and the issues are listed; report them to the admin as-is.
Omit sheet to use the configured spreadsheet.`,
      inputSchema: {
        sheet: z.string().optional().describe("Spreadsheet URL or id"),
      },
      annotations: { openWorldHint: true },
    },
    safeHandler("sync_plan", async ({ sheet }) => toolResponse(await syncPlan(services, { sheet })))
  );

  server.registerTool(
    "list_plan_versions",
    {
      title: "Plan Versions",
      description: "Admin only. Recent plan versions with their source and creation time.",
      inputSchema: {},
      annotations: { readOnlyHint: true },
    },
    safeHandler("list_plan_versions", async () => toolResponse(await getPlanHistory(services)))
  );
}
