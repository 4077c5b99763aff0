import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppServices } from "../app-services.js";
import { deleteAutoprogRule, listAutoprogRules, runAutoprog, setAutoprogRule } from "../api/handlers.js";
import { toolResponse, safeHandler } from "../helpers/tool-response.js";

export function registerAutoprogTools(server: McpServer, services: AppServices) {
  server.registerTool(
    "set_autoprog_rule",
    {
      title: "Autoprogression Rule",
      description: `Create or replace a rule that applies a progression automatically every interval_days days.
One rule per workout and exercise; calling again replaces delta and interval.
The daily run applies due rules; run_autoprog applies them immediately.

Example: "every week add a rep to pull-ups on day B"
→ { workout_key: "B", exercise_name: "Pull-up", delta_text: "+1 rep", interval_days: 7 }`,
      inputSchema: {
        workout_key: z.string().describe("Workout key from the plan (see get_plan)"),
        exercise_name: z.string(),
        delta_text: z.string().describe("Free-text progression, e.g. '+1 rep'"),
        interval_days: z.number().int().min(1).max(365).optional().describe("Days between applications. Defaults to 7"),
      },
      annotations: {},
    },
    safeHandler("set_autoprog_rule", async (params) => toolResponse(await setAutoprogRule(services, params)))
  );

  server.registerTool(
    "list_autoprog_rules",
    {
      title: "Autoprogression Rules",
      description: `List autoprogression rules with their state for today: "due" (will apply on the next run), "applied" (applied today) or "idle".`,
      inputSchema: {},
      annotations: { readOnlyHint: true },
    },
    safeHandler("list_autoprog_rules", async () => toolResponse(await listAutoprogRules(services)))
  );

  server.registerTool(
    "delete_autoprog_rule",
    {
      title: "Delete Autoprogression Rule",
      description: "Delete the autoprogression rule for a workout and exercise. Recorded progressions stay.",
      inputSchema: {
        workout_key: z.string(),
        exercise_name: z.string(),
      },
      annotations: { destructiveHint: true },
    },
    safeHandler("delete_autoprog_rule", async ({ workout_key, exercise_name }) =>
      toolResponse(await deleteAutoprogRule(services, { workout_key, exercise_name }))
    )
  );

  server.registerTool(
    "run_autoprog",
    {
      title: "Run Autoprogression",
      description: "Apply every due autoprogression rule now. Running it twice on the same day applies nothing the second time.",
      inputSchema: {},
      annotations: { idempotentHint: true },
    },
    safeHandler("run_autoprog", async () => toolResponse(await runAutoprog(services)))
  );
}
