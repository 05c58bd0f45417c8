import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect } from "effect";
import { describe, expect, test } from "vitest";
import { addWorkout, filteredHistory, workoutHistory } from "./actions.ts";
import { makeWorkoutStoreLive, WorkoutStore } from "./workout/store.ts";

// ── helpers ───────────────────────────────────────────────────────────────────

const runInTempStore = <A, E>(use: Effect.Effect<A, E, WorkoutStore>): Promise<A> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const dir = yield* fs.makeTempDirectoryScoped();
    return yield* use.pipe(Effect.provide(makeWorkoutStoreLive(`${dir}/workouts.json`)));
  }).pipe(Effect.scoped, Effect.provide(NodeContext.layer), Effect.runPromise);

const at = (iso: string) => new Date(iso);

const addScenario = Effect.gen(function* () {
  yield* addWorkout({ type: "Running", duration: 30, calories: 250 }, at("2026-01-05T07:30:00Z"));
  yield* addWorkout({ type: "Yoga", duration: 45, calories: 150 }, at("2026-01-06T18:00:00Z"));
  yield* addWorkout({ type: "Running", duration: 20, calories: 180 }, at("2026-01-07T06:45:00Z"));
});

const summary = (records: ReadonlyArray<{ type: string; durationMin: number; calories: number }>) =>
  records.map(({ type, durationMin, calories }) => [type, durationMin, calories]);

// ── addWorkout ────────────────────────────────────────────────────────────────

describe("addWorkout", () => {
  test("returns the stored record", async () => {
    const record = await runInTempStore(
      addWorkout({ type: "cycling", duration: "60", calories: "480" }, at("2026-02-02T12:00:00Z")),
    );
    expect(record).toEqual({
      type: "Cycling",
      durationMin: 60,
      calories: 480,
      createdAt: "2026-02-02T12:00:00.000Z",
    });
  });

  test("rejects Swimming and leaves the store empty", async () => {
    const result = await runInTempStore(
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          addWorkout({ type: "Swimming", duration: 30, calories: 200 }),
        );
        const store = yield* WorkoutStore;
        return { tag: error._tag, records: yield* store.listAll() };
      }),
    );
    expect(result).toEqual({ tag: "InvalidType", records: [] });
  });

  test("lists the scenario newest-first and filters it by type", async () => {
    const result = await runInTempStore(
      Effect.gen(function* () {
        yield* addScenario;
        const store = yield* WorkoutStore;
        return {
          all: yield* store.listAll(),
          running: yield* store.filterByType("Running"),
        };
      }),
    );
    expect(summary(result.all)).toEqual([
      ["Running", 20, 180],
      ["Yoga", 45, 150],
      ["Running", 30, 250],
    ]);
    expect(summary(result.running)).toEqual([
      ["Running", 20, 180],
      ["Running", 30, 250],
    ]);
  });
});

// ── workoutHistory / filteredHistory ──────────────────────────────────────────

describe("workoutHistory", () => {
  test("explains an empty history", async () => {
    expect(await runInTempStore(workoutHistory())).toBe(
      "No workouts yet. Use 'fitlog add' to record your first workout.",
    );
  });

  test("uses the caller's hint for an empty history", async () => {
    expect(
      await runInTempStore(workoutHistory("table", "Choose 'Add workout' to get started.")),
    ).toBe("No workouts yet. Choose 'Add workout' to get started.");
  });

  test("renders an empty csv as just the header", async () => {
    expect(await runInTempStore(workoutHistory("csv"))).toBe("createdAt,type,durationMin,calories");
  });

  test("renders the table newest-first", async () => {
    const output = await runInTempStore(Effect.zipRight(addScenario, workoutHistory()));
    expect(output.split("\n").slice(2, 5)).toEqual([
      "2026-01-07 06:45  Running   20 min    180",
      "2026-01-06 18:00  Yoga      45 min    150",
      "2026-01-05 07:30  Running   30 min    250",
    ]);
  });
});

describe("filteredHistory", () => {
  test("renders only the chosen type", async () => {
    const output = await runInTempStore(
      Effect.zipRight(addScenario, filteredHistory("Yoga", "csv")),
    );
    expect(output).toBe(
      ["createdAt,type,durationMin,calories", "2026-01-06T18:00:00.000Z,Yoga,45,150"].join("\n"),
    );
  });

  test("explains when no workouts match", async () => {
    const output = await runInTempStore(Effect.zipRight(addScenario, filteredHistory("Strength")));
    expect(output).toBe("No Strength workouts recorded.");
  });
});
