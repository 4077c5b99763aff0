import { ConfigurationError } from "./errors.js";
import { parsePlanDefinition } from "./plan-schema.js";
import { DAY_TYPES, REST_KEY } from "./types.js";
import type { DayContent, DayType, MacroTarget, PlanDefinition } from "./types.js";

/**
 * One immutable generation of the plan. A sync never mutates a snapshot;
 * it builds a new one and the store swaps the reference.
 */
export class PlanSnapshot {
  readonly version: number;
  readonly cycleOrder: readonly string[];
  private readonly workouts: ReadonlyMap<string, DayContent>;
  private readonly macros: ReadonlyMap<DayType, MacroTarget>;

  private constructor(
    version: number,
    cycleOrder: string[],
    workouts: Map<string, DayContent>,
    macros: Map<DayType, MacroTarget>,
  ) {
    this.version = version;
    this.cycleOrder = Object.freeze([...cycleOrder]);
    this.workouts = workouts;
    this.macros = macros;
    Object.freeze(this);
  }

  /**
   * Validates a definition and builds a frozen snapshot from it.
   * Throws ValidationError for malformed content and ConfigurationError when
   * the cycle is empty or a macro target is missing.
   */
  static fromDefinition(version: number, input: unknown): PlanSnapshot {
    const definition = parsePlanDefinition(input);

    if (definition.cycle_order.length === 0) {
      throw new ConfigurationError("cycle_order is empty");
    }

    const macros = new Map<DayType, MacroTarget>();
    for (const dayType of DAY_TYPES) {
      const values = definition.macros[dayType];
      if (!values) {
        throw new ConfigurationError(`Missing macro target for "${dayType}" days`);
      }
      macros.set(dayType, Object.freeze({ day_type: dayType, ...values }));
    }

    const workouts = new Map<string, DayContent>();
    for (const [key, day] of Object.entries(definition.workouts)) {
      workouts.set(key, deepFreeze(structuredClone(day)));
    }

    return new PlanSnapshot(version, definition.cycle_order, workouts, macros);
  }

  get cycleLength(): number {
    return this.cycleOrder.length;
  }

  getDayContent(key: string): DayContent | undefined {
    return this.workouts.get(key);
  }

  workoutKeys(): string[] {
    return [...this.workouts.keys()];
  }

  isRestKey(key: string): boolean {
    return key === REST_KEY;
  }

  getMacros(dayType: DayType): MacroTarget {
    const target = this.macros.get(dayType);
    if (!target) {
      throw new ConfigurationError(`Missing macro target for "${dayType}" days`);
    }
    return target;
  }

  toDefinition(): PlanDefinition {
    const macros: PlanDefinition["macros"] = {};
    for (const [dayType, { day_type: _ignored, ...values }] of this.macros) {
      macros[dayType] = values;
    }
    return {
      cycle_order: [...this.cycleOrder],
      workouts: Object.fromEntries(this.workouts),
      macros,
    };
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Holds the active plan snapshot. Injected into the assembler and the tools;
 * there is no module-level instance.
 *
 * load() is all-or-nothing: the new snapshot is fully built before the
 * reference is swapped, so a failing sync leaves the previous plan callable.
 */
export class PlanStore {
  private snapshot: PlanSnapshot | null = null;

  constructor(initial?: PlanSnapshot) {
    this.snapshot = initial ?? null;
  }

  /**
   * Validates and activates a new plan. `version` defaults to the next
   * number after the active snapshot; persisted versions pass their own.
   */
  load(definition: unknown, version?: number): PlanSnapshot {
    const next = PlanSnapshot.fromDefinition(version ?? this.nextVersion(), definition);
    this.snapshot = next;
    return next;
  }

  /** Builds a snapshot without activating it. */
  prepare(definition: unknown, version?: number): PlanSnapshot {
    return PlanSnapshot.fromDefinition(version ?? this.nextVersion(), definition);
  }

  activate(snapshot: PlanSnapshot): void {
    this.snapshot = snapshot;
  }

  nextVersion(): number {
    return (this.snapshot?.version ?? 0) + 1;
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  current(): PlanSnapshot {
    if (!this.snapshot) {
      throw new ConfigurationError("No plan has been loaded yet");
    }
    return this.snapshot;
  }

  getDayContent(key: string): DayContent | undefined {
    return this.current().getDayContent(key);
  }

  getMacros(dayType: DayType): MacroTarget {
    return this.current().getMacros(dayType);
  }
}
