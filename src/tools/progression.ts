import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppServices } from "../app-services.js";
import { listOverrides, setProgressOverride } from "../api/handlers.js";
import { toolResponse, safeHandler } from "../helpers/tool-response.js";

export function registerProgressionTools(server: McpServer, services: AppServices) {
  server.registerTool(
    "set_progress_override",
    {
      title: "Record Progression",
      description: `Record a progression for an exercise. It shows next to the exercise in every workout that contains it.
The newest value replaces the previous one; nothing is summed.

Examples:
- "add 2 reps to squats" → { exercise_name: "Squat", delta_text: "+2 reps" }
- "bench up 2.5 kg" → { exercise_name: "Bench press", delta_text: "+2.5 kg" }`,
      inputSchema: {
        exercise_name: z.string().describe("Exercise name exactly as it appears in the plan"),
        delta_text: z.string().describe("Free-text progression, e.g. '+2 reps'"),
      },
      annotations: {},
    },
    safeHandler("set_progress_override", async ({ exercise_name, delta_text }) =>
      toolResponse(await setProgressOverride(services, { exercise_name, delta_text }))
    )
  );

  server.registerTool(
    "list_progress_overrides",
    {
      title: "Progressions",
      description: "List the user's current progression per exercise.",
      inputSchema: {},
      annotations: { readOnlyHint: true },
    },
    safeHandler("list_progress_overrides", async () => toolResponse(await listOverrides(services)))
  );
}
