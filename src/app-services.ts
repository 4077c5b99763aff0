import type { AppConfig } from "./config.js";
import { PgProgressionStore } from "./helpers/pg-progression-store.js";
import { pgCycleStarts } from "./helpers/settings-helpers.js";
import { AutoprogressionEngine } from "./plan/autoprogression-engine.js";
import { systemClock } from "./plan/clock.js";
import type { Clock } from "./plan/clock.js";
import { DailyPlanAssembler } from "./plan/daily-plan-assembler.js";
import type { CycleStartSource } from "./plan/daily-plan-assembler.js";
import { PlanStore } from "./plan/plan-store.js";
import { ProgressionLedger } from "./plan/progression-ledger.js";
import type { ProgressionStore } from "./plan/progression-store.js";

/**
 * Everything a tool handler needs, built once at start-up and passed down.
 * Nothing here is a module-level singleton.
 */
export interface AppServices {
  config: AppConfig;
  clock: Clock;
  plans: PlanStore;
  ledger: ProgressionLedger;
  engine: AutoprogressionEngine;
  assembler: DailyPlanAssembler;
}

export interface ServiceOverrides {
  plans?: PlanStore;
  progressionStore?: ProgressionStore;
  cycleStarts?: CycleStartSource;
  clock?: Clock;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const clock = overrides.clock ?? systemClock;
  const plans = overrides.plans ?? new PlanStore();
  const progressionStore = overrides.progressionStore ?? new PgProgressionStore();
  const ledger = new ProgressionLedger(progressionStore, clock);
  const engine = new AutoprogressionEngine(progressionStore, clock);
  const assembler = new DailyPlanAssembler({
    plans,
    ledger,
    cycleStarts: overrides.cycleStarts ?? pgCycleStarts,
  });
  return { config, clock, plans, ledger, engine, assembler };
}

export function isAdmin(services: AppServices, userId: number): boolean {
  return services.config.ADMIN_USER_IDS.includes(userId);
}
