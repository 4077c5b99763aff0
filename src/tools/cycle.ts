import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppServices } from "../app-services.js";
import { getCycle, getPlan, setCycleStart, setTimezone } from "../api/handlers.js";
import { toolResponse, safeHandler } from "../helpers/tool-response.js";

export function registerCycleTools(server: McpServer, services: AppServices) {
  server.registerTool(
    "get_cycle",
    {
      title: "Cycle Preview",
      description: `Upcoming days of the training cycle: date, cycle position, workout key, day type and title.
Use for "what's this week?" or "when is my next leg day?".`,
      inputSchema: {
        from: z.string().optional().describe("First date (YYYY-MM-DD or 'today'). Defaults to today"),
        days: z.number().int().min(1).max(42).optional().describe("Number of days, 1-42. Defaults to 7"),
      },
      annotations: { readOnlyHint: true },
    },
    safeHandler("get_cycle", async ({ from, days }) => toolResponse(await getCycle(services, { from, days })))
  );

  server.registerTool(
    "set_cycle_start",
    {
      title: "Set Cycle Start",
      description: `Set the date the user's cycle started (cycle day 0). Every daily plan is computed from it.
Examples: "I started today" → { date: "today" }, "started on March 3rd" → { date: "2025-03-03" }`,
      inputSchema: {
        date: z.string().describe("YYYY-MM-DD or 'today'"),
      },
      annotations: { idempotentHint: true },
    },
    safeHandler("set_cycle_start", async ({ date }) => toolResponse(await setCycleStart(services, { date })))
  );

  server.registerTool(
    "set_timezone",
    {
      title: "Set Time Zone",
      description: `Set the user's IANA time zone (e.g. "Europe/Moscow"). "Today" and reminder times follow it.`,
      inputSchema: {
        timezone: z.string().describe("IANA time zone name"),
      },
      annotations: { idempotentHint: true },
    },
    safeHandler("set_timezone", async ({ timezone }) => toolResponse(await setTimezone(services, { timezone })))
  );

  server.registerTool(
    "get_plan",
    {
      title: "Plan Summary",
      description: "The active plan: version, cycle order, workouts and macro targets for train and rest days.",
      inputSchema: {},
      annotations: { readOnlyHint: true },
    },
    safeHandler("get_plan", async () => toolResponse(await getPlan(services)))
  );
}
