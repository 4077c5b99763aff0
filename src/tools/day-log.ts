import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppServices } from "../app-services.js";
import { getWeekStats, markDay } from "../api/handlers.js";
import { toolResponse, safeHandler } from "../helpers/tool-response.js";

export function registerDayLogTools(server: McpServer, services: AppServices) {
  server.registerTool(
    "mark_day",
    {
      title: "Mark Day",
      description: `Mark a day as done or skipped. The day type and workout are taken from the cycle for that date.
Marking the same date again replaces the status.

Examples:
- "done for today" → { status: "done" }
- "skipped yesterday" → { status: "skipped", date: "yesterday" }`,
      inputSchema: {
        status: z.enum(["done", "skipped"]),
        date: z.string().optional().describe("YYYY-MM-DD, 'today' or 'yesterday'. Defaults to today"),
        note: z.string().max(500).optional(),
      },
      annotations: { idempotentHint: true },
    },
    safeHandler("mark_day", async ({ status, date, note }) =>
      toolResponse(await markDay(services, { status, date, note }))
    )
  );

  server.registerTool(
    "get_week_stats",
    {
      title: "Week Stats",
      description: `Monday-to-Sunday summary for the current week: training and rest days done, skipped and missed days, training days still ahead, plus a per-day list.`,
      inputSchema: {
        date: z.string().optional().describe("Any date in the week. Defaults to today"),
      },
      annotations: { readOnlyHint: true },
    },
    safeHandler("get_week_stats", async ({ date }) => toolResponse(await getWeekStats(services, { date })))
  );
}
