import { Effect } from "effect";
import { renderRecords } from "./render.ts";
import type { OutputFormat } from "./render.ts";
import { WorkoutStore } from "./workout/store.ts";
import type { StoreError } from "./workout/store.ts";
import type { WorkoutCandidate, WorkoutRecord, WorkoutType } from "./workout/types.ts";
import { validateWorkout } from "./workout/validate.ts";
import type { ValidationError } from "./workout/validate.ts";

export const ADD_HINT = "Use 'fitlog add' to record your first workout.";

export const emptyHistory = (hint: string): string => `No workouts yet. ${hint}`;

export const emptyFilter = (type: WorkoutType): string => `No ${type} workouts recorded.`;

// Validation runs before the store is touched, so a rejected candidate leaves it as it was
export const addWorkout = (
  candidate: WorkoutCandidate,
  now: Date = new Date(),
): Effect.Effect<WorkoutRecord, ValidationError | StoreError, WorkoutStore> =>
  Effect.gen(function* () {
    const record = yield* validateWorkout(candidate, now);
    const store = yield* WorkoutStore;
    yield* store.append(record);
    return record;
  });

export const workoutHistory = (
  format: OutputFormat = "table",
  hint: string = ADD_HINT,
): Effect.Effect<string, never, WorkoutStore> =>
  Effect.gen(function* () {
    const store = yield* WorkoutStore;
    const records = yield* store.listAll();
    if (records.length === 0 && format === "table") return emptyHistory(hint);
    return renderRecords(records, format);
  });

export const filteredHistory = (
  type: WorkoutType,
  format: OutputFormat = "table",
): Effect.Effect<string, never, WorkoutStore> =>
  Effect.gen(function* () {
    const store = yield* WorkoutStore;
    const records = yield* store.filterByType(type);
    if (records.length === 0 && format === "table") return emptyFilter(type);
    return renderRecords(records, format);
  });
