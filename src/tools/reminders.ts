import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppServices } from "../app-services.js";
import { getReminders, updateReminder } from "../api/handlers.js";
import { REMINDER_KINDS, WEEKDAYS } from "../helpers/reminder-schedule.js";
import { toolResponse, safeHandler } from "../helpers/tool-response.js";

export function registerRemindersTool(server: McpServer, services: AppServices) {
  server.registerTool(
    "manage_reminders",
    {
      title: "Reminders",
      description: `List, set or turn off reminders. Times are HH:MM in the user's time zone.
Kinds: water, motivation, sleep, workout (daily), daily_report (daily, default 23:00), weekly_report (weekday + time, default Sunday 20:00).

Examples:
- "remind me to drink water at 10" → { action: "set", kind: "water", time: "10:00" }
- "weekly report on Friday at 19:00" → { action: "set", kind: "weekly_report", time: "19:00", day: "fri" }
- "stop the sleep reminder" → { action: "off", kind: "sleep" }`,
      inputSchema: {
        action: z.enum(["list", "set", "off"]),
        kind: z.enum(REMINDER_KINDS).optional(),
        time: z.string().optional().describe("HH:MM, 24h"),
        day: z.enum(WEEKDAYS).optional().describe("Only for weekly_report"),
      },
      annotations: {},
    },
    safeHandler("manage_reminders", async ({ action, kind, time, day }) => {
      if (action === "list") {
        return toolResponse(await getReminders(services));
      }
      if (!kind) {
        return toolResponse({ error: "validation_failed", message: `kind is required for ${action}` }, true);
      }
      if (action === "off") {
        return toolResponse(await updateReminder(services, { kind, enabled: false }));
      }
      return toolResponse(await updateReminder(services, { kind, time, day }));
    })
  );
}
