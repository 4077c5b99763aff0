import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppServices } from "../app-services.js";
import { getContext } from "../api/handlers.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

export function registerContextTool(server: McpServer, services: AppServices) {
  server.registerTool(
    "get_context",
    {
      title: "Context",
      description: `${APP_CONTEXT}MANDATORY: Call this tool FIRST before calling any other cycle-coach tool. Returns the full user context in a single call.

Returns:
- plan: whether a plan is loaded and its version
- cycle_start: the date of cycle day 0 (null when not set)
- today: today's day type and workout title
- required_action and suggestion for next steps

CRITICAL ROUTING: you MUST follow the "required_action" field in the response:
- If required_action is "sync_plan": no plan is loaded. Admins call sync_plan; other users wait.
- If required_action is "set_cycle_start": ask when the cycle started, then call set_cycle_start.
- If required_action is null: respond normally using the suggestion field.`,
      inputSchema: {},
      annotations: { readOnlyHint: true },
    },
    safeHandler("get_context", async () => toolResponse(await getContext(services)))
  );
}
