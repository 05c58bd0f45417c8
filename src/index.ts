#!/usr/bin/env -S npx tsx
import { Args, Command, Options, Prompt } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Console, Effect, Option } from "effect";
import { addWorkout, filteredHistory, workoutHistory } from "./actions.ts";
import { OUTPUT_FORMATS, describeRecord } from "./render.ts";
import { DATA_FILE_DEFAULT, DATA_FILE_ENV, WORKOUT_TYPES } from "./workout/constants.ts";
import { makeWorkoutStoreLive } from "./workout/store.ts";
import type { StoreError } from "./workout/store.ts";
import type { WorkoutType } from "./workout/types.ts";
import { validateCalories, validateDuration, validateType } from "./workout/validate.ts";
import type { ValidationError } from "./workout/validate.ts";

// ── CLI options ──────────────────────────────────────────────────────────────

const fileOption = Options.text("file").pipe(
  Options.withAlias("f"),
  Options.withDescription(`Workout data file (or set ${DATA_FILE_ENV}, default ${DATA_FILE_DEFAULT})`),
  Options.optional,
);

const formatOption = Options.choice("format", OUTPUT_FORMATS).pipe(
  Options.withDescription("Output format: table, json or csv"),
  Options.withDefault("table"),
);

const typeOption = Options.text("type").pipe(
  Options.withAlias("t"),
  Options.withDescription(`Workout type: ${WORKOUT_TYPES.join(", ")}`),
);

const durationOption = Options.text("duration").pipe(
  Options.withAlias("d"),
  Options.withDescription("Duration in whole minutes"),
);

const caloriesOption = Options.text("calories").pipe(
  Options.withAlias("c"),
  Options.withDescription("Calories burned (whole number, 0 or more)"),
);

const typeArg = Args.text({ name: "type" }).pipe(
  Args.withDescription(`One of: ${WORKOUT_TYPES.join(", ")}`),
);

const resolveDataFile = (opt: Option.Option<string>): string =>
  Option.isSome(opt) ? opt.value : (process.env[DATA_FILE_ENV] ?? DATA_FILE_DEFAULT);

// ── Error reporting ──────────────────────────────────────────────────────────

const reportError = (e: ValidationError | StoreError) => Console.error(e.message);

const reportValidationErrors = {
  InvalidType: reportError,
  InvalidDuration: reportError,
  InvalidCalories: reportError,
} as const;

// ── Add command ──────────────────────────────────────────────────────────────

const addCommand = Command.make(
  "add",
  { type: typeOption, duration: durationOption, calories: caloriesOption, file: fileOption },
  ({ type, duration, calories, file }) =>
    Effect.gen(function* () {
      const record = yield* addWorkout({ type, duration, calories });
      yield* Console.log(describeRecord(record));
    }).pipe(
      Effect.provide(makeWorkoutStoreLive(resolveDataFile(file))),
      Effect.catchTags({ ...reportValidationErrors, CorruptStore: reportError, WriteFailure: reportError }),
    ),
).pipe(Command.withDescription("Record a workout"));

// ── History and filter commands ──────────────────────────────────────────────

const historyCommand = Command.make(
  "history",
  { format: formatOption, file: fileOption },
  ({ format, file }) =>
    workoutHistory(format).pipe(
      Effect.flatMap((output) => Console.log(output)),
      Effect.provide(makeWorkoutStoreLive(resolveDataFile(file))),
      Effect.catchTag("CorruptStore", reportError),
    ),
).pipe(Command.withDescription("Show all workouts, newest first"));

const filterCommand = Command.make(
  "filter",
  { type: typeArg, format: formatOption, file: fileOption },
  ({ type, format, file }) =>
    Effect.gen(function* () {
      const workoutType = yield* validateType(type);
      yield* Console.log(yield* filteredHistory(workoutType, format));
    }).pipe(
      Effect.provide(makeWorkoutStoreLive(resolveDataFile(file))),
      Effect.catchTags({ InvalidType: reportError, CorruptStore: reportError }),
    ),
).pipe(Command.withDescription("Show workouts of one type, newest first"));

// ── Interactive menu ─────────────────────────────────────────────────────────

const MENU_ADD_HINT = "Choose 'Add workout' to record your first workout.";

const menuPrompt = Prompt.select<"add" | "history" | "filter" | "quit">({
  message: "Fitness log",
  choices: [
    { title: "Add workout", value: "add" },
    { title: "View history", value: "history" },
    { title: "Filter by type", value: "filter" },
    { title: "Quit", value: "quit" },
  ],
});

const typePrompt = Prompt.select({
  message: "Workout type",
  choices: WORKOUT_TYPES.map((t) => ({ title: t, value: t })),
});

const filterPrompt = Prompt.select<WorkoutType | "All">({
  message: "Show which workouts?",
  choices: [
    { title: "All", value: "All" },
    ...WORKOUT_TYPES.map((t) => ({ title: t, value: t })),
  ],
});

// Each field re-prompts with the validator's message until it passes
const durationPrompt = Prompt.text({
  message: "Duration in minutes",
  validate: (value) =>
    validateDuration(value).pipe(
      Effect.mapBoth({ onFailure: (e) => e.message, onSuccess: () => value }),
    ),
});

const caloriesPrompt = Prompt.text({
  message: "Calories burned",
  validate: (value) =>
    validateCalories(value).pipe(
      Effect.mapBoth({ onFailure: (e) => e.message, onSuccess: () => value }),
    ),
});

const promptAndAdd = Effect.gen(function* () {
  const type = yield* Prompt.run(typePrompt);
  const duration = yield* Prompt.run(durationPrompt);
  const calories = yield* Prompt.run(caloriesPrompt);
  const record = yield* addWorkout({ type, duration, calories });
  yield* Console.log(describeRecord(record));
}).pipe(Effect.catchTags({ ...reportValidationErrors, WriteFailure: reportError }));

const promptAndFilter = Effect.gen(function* () {
  const choice = yield* Prompt.run(filterPrompt);
  const output =
    choice === "All"
      ? yield* workoutHistory("table", MENU_ADD_HINT)
      : yield* filteredHistory(choice);
  yield* Console.log(output);
});

const menuLoop = Effect.gen(function* () {
  while (true) {
    const choice = yield* Prompt.run(menuPrompt);
    switch (choice) {
      case "add":
        yield* promptAndAdd;
        break;
      case "history":
        yield* Console.log(yield* workoutHistory("table", MENU_ADD_HINT));
        break;
      case "filter":
        yield* promptAndFilter;
        break;
      case "quit":
        yield* Console.log("Goodbye!");
        return;
    }
  }
});

const menuCommand = Command.make("menu", { file: fileOption }, ({ file }) =>
  menuLoop.pipe(
    Effect.provide(makeWorkoutStoreLive(resolveDataFile(file))),
    Effect.catchTags({
      QuitException: () => Console.log("Goodbye!"),
      CorruptStore: reportError,
    }),
  ),
).pipe(Command.withDescription("Interactive menu: add, view and filter workouts"));

// ── Main command + CLI ───────────────────────────────────────────────────────

const mainCommand = Command.make("fitlog").pipe(
  Command.withDescription("Record and review your workouts"),
  Command.withSubcommands([addCommand, historyCommand, filterCommand, menuCommand]),
);

const cli = Command.run(mainCommand, {
  name: "fitlog",
  version: "1.0.0",
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
