/**
 * API Specification for the unified `api` tool.
 * The LLM reads this to understand available endpoints.
 */

export const API_SPEC = `
# Cycle Coach API

Base: All endpoints are called via the \`api\` tool with { method, path, body }.
Dates are YYYY-MM-DD in the user's time zone; "today", "yesterday" and "tomorrow" are accepted too.

## Context

### GET /context
MANDATORY first call.
Response: { plan: { loaded, version }, cycle_start, timezone, today, is_admin, required_action, suggestion }
- required_action: "sync_plan" | "set_cycle_start" | null. Follow this!

## Daily plan & cycle

### GET /today
The plan for one date: day type, macros, workout levels with progression overrides.
Body: { date? }
Response: { date, plan_version, position, workout_key, day_type, macros, workout?: { title, levels: { easy, medium, hard } }, warning? }
- Each exercise is { entry: { name, sets, reps, weight? }, override: string | null }

### GET /cycle
Upcoming cycle days.
Body: { from?, days? (1-42, default 7) }
Response: { plan_version, cycle_start, cycle_order, days: [{ date, position, workout_key, day_type, title }] }

### PUT /cycle/start
Set the date the cycle started (day 0).
Body: { date }
Response: { cycle_start }

### PUT /timezone
Body: { timezone } (IANA name, e.g. "Europe/Moscow")
Response: { timezone }

### GET /plan
Active plan summary.
Response: { version, cycle_order, workouts: [{ workout_key, title }], macros: { train, rest } }

## Progression

### GET /progression
Response: { overrides: [{ exercise_name, delta_text, applied_at }] }

### POST /progression
Record a progression for an exercise. The newest value replaces the previous one.
Body: { exercise_name, delta_text } (e.g. "+2 reps", "+2.5 kg")
Response: { override }

## Autoprogression

### GET /autoprog
Response: { today, rules: [{ id, workout_key, exercise_name, delta_text, interval_days, last_applied_date, state }] }
- state: "due" | "idle" | "applied"

### POST /autoprog
Create or replace the rule for a workout/exercise pair.
Body: { workout_key, exercise_name, delta_text, interval_days? (default 7) }
Response: { rule }

### DELETE /autoprog
Body: { workout_key, exercise_name }
Response: { deleted }

### POST /autoprog/run
Apply every due rule now. Safe to repeat.
Body: { date? }
Response: { today, applied, skipped, failed }

## Day log

### POST /days
Body: { date?, status: "done" | "skipped", note? }
Response: { logged }

### GET /days/week
Monday-based week summary.
Body: { date? }
Response: { week_start, week_end, train_done, rest_done, skipped, missed, train_remaining, days }

## Reminders

### GET /reminders
Response: { timezone, reminders: [{ kind, time, enabled, day?, next_trigger_at }] }

### PUT /reminders
Body: { kind, time?, day? (weekly_report only), enabled? }
- kind: "water" | "motivation" | "sleep" | "workout" | "daily_report" | "weekly_report"
- { enabled: false } turns a reminder off
Response: { kind, time, enabled, day?, next_trigger_at }

## Measurements

### POST /measurements
Body: { date?, weight?, waist?, belly?, biceps?, chest?, note? } (at least one measurement)
Response: { logged, previous?, change? }

### GET /measurements
Body: { limit? }
Response: { measurements } (newest first)

### GET /measurements/latest
Response: { latest, previous?, change? }

### PATCH /measurements/latest
Body: { weight?, waist?, belly?, biceps?, chest?, note? }
Response: { updated }

## Med log

### POST /medlog
Body: { name, amount_mg?, amount_ml?, note?, date? }
Response: { logged }

### GET /medlog
Body: { limit? (1-200), name? }
Response: { entries } (newest first)

## Plan (admin)

### POST /plan/sync
Rebuild the plan from the spreadsheet (or inline rows) and activate it as a new version.
Body: { sheet? } or { plan_rows, macro_rows, cycle_rows }
Response: { version, cycle_length, workouts, source }

### GET /plan/versions
Response: { versions }
`;
