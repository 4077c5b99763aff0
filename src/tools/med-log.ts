import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppServices } from "../app-services.js";
import { getMedLog, logMed } from "../api/handlers.js";
import { toolResponse, safeHandler } from "../helpers/tool-response.js";

export function registerMedLogTool(server: McpServer, services: AppServices) {
  server.registerTool(
    "manage_med_log",
    {
      title: "Med Log",
      description: `Log injections and medication: name, dose in mg, volume in ml, optional note.
Use action "log" to record a dose and "history" to list past entries (optionally for one name).

Examples:
- "testosterone 125 mg, 0.5 ml after training" → log, name: "testosterone", amount_mg: 125, amount_ml: 0.5, note: "after training"
- "when did I last take B12?" → history, name: "B12", limit: 1`,
      inputSchema: {
        action: z.enum(["log", "history"]),
        name: z.string().optional(),
        amount_mg: z.number().optional(),
        amount_ml: z.number().optional(),
        note: z.string().optional(),
        date: z.string().optional().describe("Date for log. Defaults to today"),
        limit: z.number().int().optional().describe("Entries for history. Defaults to 20"),
      },
      annotations: {},
    },
    safeHandler("manage_med_log", async ({ action, limit, name, ...values }) => {
      if (action === "history") {
        return toolResponse(await getMedLog(services, { limit, name }));
      }
      return toolResponse(await logMed(services, { name, ...values }));
    })
  );
}
