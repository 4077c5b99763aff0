import { vi } from "vitest";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { createServices } from "../../app-services.js";
import type { AppServices } from "../../app-services.js";
import { loadConfig } from "../../config.js";
import type { ToolResult } from "../../helpers/tool-response.js";
import { PlanStore } from "../../plan/plan-store.js";
import { FixedClock, InMemoryProgressionStore, samplePlan } from "../../plan/__tests__/fakes.js";

export type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResult>;

/** Registers tools on a stand-in server and returns their handlers by name. */
export function captureTools(register: (server: McpServer) => void): Map<string, ToolHandler> {
  const handlers = new Map<string, ToolHandler>();
  const server = {
    registerTool: vi.fn((name: string, _config: unknown, handler: ToolHandler) => {
      handlers.set(name, handler);
    }),
    resource: vi.fn(),
  } as unknown as McpServer;
  register(server);
  return handlers;
}

export function parse(result: ToolResult): Record<string, unknown> {
  return JSON.parse(result.content[0].text);
}

export interface TestServices extends AppServices {
  starts: Map<number, string>;
  progression: InMemoryProgressionStore;
  fixedClock: FixedClock;
}

export function makeServices(options: { loadPlan?: boolean; env?: Record<string, string> } = {}): TestServices {
  const plans = new PlanStore();
  if (options.loadPlan !== false) plans.load(samplePlan);
  const starts = new Map<number, string>();
  const progression = new InMemoryProgressionStore();
  // 09:00 in Moscow
  const fixedClock = new FixedClock(new Date("2024-01-03T06:00:00Z"));
  const config = loadConfig({ DATABASE_URL: "postgres://localhost/test", ADMIN_USER_IDS: "1", ...options.env });
  const services = createServices(config, {
    plans,
    progressionStore: progression,
    cycleStarts: { getCycleStart: async userId => starts.get(userId) ?? null },
    clock: fixedClock,
  });
  return { ...services, starts, progression, fixedClock };
}
