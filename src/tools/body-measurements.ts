import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppServices } from "../app-services.js";
import {
  getLatestMeasurement,
  getMeasurements,
  logMeasurement,
  updateLatestMeasurement,
} from "../api/handlers.js";
import { toolResponse, safeHandler } from "../helpers/tool-response.js";

export function registerBodyMeasurementsTool(server: McpServer, services: AppServices) {
  server.registerTool(
    "manage_body_measurements",
    {
      title: "Body Progress",
      description: `Track body progress: weight (kg) and waist, belly, biceps, chest (cm).
Use action "log" to record an entry, "history" for the latest entries, "latest" for the newest entry with the change since the previous one, "update_latest" to correct the newest entry.

Examples:
- "weight 82.4, waist 84" → log, weight: 82.4, waist: 84
- "actually it was 82.1" → update_latest, weight: 82.1
- "how am I doing?" → latest`,
      inputSchema: {
        action: z.enum(["log", "history", "latest", "update_latest"]),
        date: z.string().optional().describe("Date for log. Defaults to today"),
        weight: z.number().optional(),
        waist: z.number().optional(),
        belly: z.number().optional(),
        biceps: z.number().optional(),
        chest: z.number().optional(),
        note: z.string().optional(),
        limit: z.number().int().optional().describe("Entries for history. Defaults to 20"),
      },
      annotations: {},
    },
    safeHandler("manage_body_measurements", async ({ action, limit, ...values }) => {
      if (action === "log") {
        return toolResponse(await logMeasurement(services, values));
      }
      if (action === "history") {
        return toolResponse(await getMeasurements(services, { limit }));
      }
      if (action === "latest") {
        return toolResponse(await getLatestMeasurement(services));
      }
      const { date: _date, ...patch } = values;
      return toolResponse(await updateLatestMeasurement(services, patch));
    })
  );
}
