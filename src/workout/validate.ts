import { Data, Either, Option } from "effect";
import { WORKOUT_TYPES } from "./constants.ts";
import type { WorkoutCandidate, WorkoutRecord, WorkoutType } from "./types.ts";

// ── Error types ──────────────────────────────────────────────────────────────

export class InvalidType extends Data.TaggedError("InvalidType")<{
  message: string;
  input: unknown;
}> {}

export class InvalidDuration extends Data.TaggedError("InvalidDuration")<{
  message: string;
  input: unknown;
}> {}

export class InvalidCalories extends Data.TaggedError("InvalidCalories")<{
  message: string;
  input: unknown;
}> {}

export type ValidationError = InvalidType | InvalidDuration | InvalidCalories;

// ── Field parsing ────────────────────────────────────────────────────────────

const WHOLE_NUMBER = /^\d+$/;

const describeInput = (input: unknown): string =>
  typeof input === "string" ? `"${input.trim()}"` : String(input);

export const parseWorkoutType = (input: unknown): Option.Option<WorkoutType> => {
  if (typeof input !== "string") return Option.none();
  const normalized = input.trim().toLowerCase();
  return Option.fromNullable(WORKOUT_TYPES.find((t) => t.toLowerCase() === normalized));
};

/**
 * Accepts a safe integer, or a string of decimal digits with optional
 * surrounding whitespace. Signs, decimals and exponents are rejected.
 */
export const parseWholeNumber = (input: unknown): Option.Option<number> => {
  if (typeof input === "number") {
    return Number.isSafeInteger(input) ? Option.some(input) : Option.none();
  }
  if (typeof input !== "string") return Option.none();
  const trimmed = input.trim();
  if (!WHOLE_NUMBER.test(trimmed)) return Option.none();
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? Option.some(value) : Option.none();
};

// ── Field validators ─────────────────────────────────────────────────────────

export const validateType = (input: unknown): Either.Either<WorkoutType, InvalidType> =>
  Either.fromOption(
    parseWorkoutType(input),
    () =>
      new InvalidType({
        message: `${describeInput(input)} is not a workout type. Choose one of: ${WORKOUT_TYPES.join(", ")}.`,
        input,
      }),
  );

export const validateDuration = (input: unknown): Either.Either<number, InvalidDuration> =>
  Either.fromOption(
    Option.filter(parseWholeNumber(input), (n) => n > 0),
    () =>
      new InvalidDuration({
        message: "Duration must be a positive whole number of minutes (e.g., 30).",
        input,
      }),
  );

export const validateCalories = (input: unknown): Either.Either<number, InvalidCalories> =>
  Either.fromOption(
    Option.filter(parseWholeNumber(input), (n) => n >= 0),
    () =>
      new InvalidCalories({
        message: "Calories must be a whole number of zero or more (e.g., 250).",
        input,
      }),
  );

// ── Candidate validation ─────────────────────────────────────────────────────

/**
 * Checks type, then duration, then calories, and stops at the first failure.
 * The returned record is stamped with `now`.
 */
export const validateWorkout = (
  candidate: WorkoutCandidate,
  now: Date = new Date(),
): Either.Either<WorkoutRecord, ValidationError> =>
  Either.gen(function* () {
    const type = yield* validateType(candidate.type);
    const durationMin = yield* validateDuration(candidate.duration);
    const calories = yield* validateCalories(candidate.calories);
    return { type, durationMin, calories, createdAt: now.toISOString() };
  });
