import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppServices } from "../app-services.js";
import { getToday } from "../api/handlers.js";
import { toolResponse, safeHandler } from "../helpers/tool-response.js";

export function registerTodayPlanTool(server: McpServer, services: AppServices) {
  server.registerTool(
    "get_today",
    {
      title: "Daily Plan",
      description: `Get the plan for a date: training or rest day, macro targets, and the workout at three levels (easy, medium, hard).
Each exercise carries the user's latest progression override (e.g. "+2 reps") next to the base prescription.
If the response has a warning, the cycle names a workout with no content and the day is served as rest; tell the user.

Examples:
- "what's today?" → {}
- "what do I do tomorrow?" → { date: "tomorrow" }`,
      inputSchema: {
        date: z.string().optional().describe("YYYY-MM-DD, 'today', 'tomorrow' or 'yesterday'. Defaults to today"),
      },
      annotations: { readOnlyHint: true },
    },
    safeHandler("get_today", async ({ date }) => toolResponse(await getToday(services, { date })))
  );
}
