import { Schema } from "effect";
import { WORKOUT_TYPES } from "./constants.ts";

// The closed set of workout kinds
export const WorkoutType = Schema.Literal(...WORKOUT_TYPES);
export type WorkoutType = typeof WorkoutType.Type;

const Timestamp = Schema.String.pipe(Schema.filter((s) => !Number.isNaN(Date.parse(s))));

// A validated, immutable workout entry
export const WorkoutRecord = Schema.Struct({
  type: WorkoutType,
  durationMin: Schema.Int.pipe(Schema.positive()),
  calories: Schema.Int.pipe(Schema.nonNegative()),
  createdAt: Timestamp,
});
export interface WorkoutRecord extends Schema.Schema.Type<typeof WorkoutRecord> {}

// On-disk document: a JSON array of records in insertion order
export const StoredWorkouts = Schema.parseJson(Schema.Array(WorkoutRecord));

// Raw fields as they arrive from a prompt or a flag
export interface WorkoutCandidate {
  readonly type: unknown;
  readonly duration: unknown;
  readonly calories: unknown;
}
