import { FileSystem, Path } from "@effect/platform";
import { Context, Data, Effect, Either, Layer, Option, Ref, Schema } from "effect";
import { DATA_FILE_DEFAULT } from "./constants.ts";
import { StoredWorkouts } from "./types.ts";
import type { WorkoutRecord, WorkoutType } from "./types.ts";

// ── Error types ──────────────────────────────────────────────────────────────

export class CorruptStore extends Data.TaggedError("CorruptStore")<{
  message: string;
  path: string;
  cause?: unknown;
}> {}

export class WriteFailure extends Data.TaggedError("WriteFailure")<{
  message: string;
  path: string;
  cause?: unknown;
}> {}

export type StoreError = CorruptStore | WriteFailure;

// ── Service interface ────────────────────────────────────────────────────────

export class WorkoutStore extends Context.Tag("WorkoutStore")<
  WorkoutStore,
  {
    readonly load: () => Effect.Effect<ReadonlyArray<WorkoutRecord>, CorruptStore>;
    readonly append: (record: WorkoutRecord) => Effect.Effect<void, StoreError>;
    readonly listAll: () => Effect.Effect<ReadonlyArray<WorkoutRecord>>;
    readonly filterByType: (type: WorkoutType) => Effect.Effect<ReadonlyArray<WorkoutRecord>>;
  }
>() {}

// ── Ordering and encoding helpers ────────────────────────────────────────────

// Newest createdAt first; equal timestamps keep the later append in front
export const newestFirst = (records: ReadonlyArray<WorkoutRecord>): WorkoutRecord[] =>
  records
    .map((record, index) => ({ record, index, time: Date.parse(record.createdAt) }))
    .sort((a, b) => b.time - a.time || b.index - a.index)
    .map(({ record }) => record);

// Unknown fields are rejected rather than dropped, so a rewrite never loses data
export const decodeStore = (content: string) =>
  Schema.decodeUnknownEither(StoredWorkouts, { onExcessProperty: "error" })(content);

export const encodeStore = (records: ReadonlyArray<WorkoutRecord>): string =>
  `${JSON.stringify(records, null, 2)}\n`;

// ── Live implementation ──────────────────────────────────────────────────────

export const makeWorkoutStoreLive = (
  file: string = DATA_FILE_DEFAULT,
): Layer.Layer<WorkoutStore, CorruptStore, FileSystem.FileSystem | Path.Path> =>
  Layer.effect(
    WorkoutStore,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const path = yield* Path.Path;
      const records = yield* Ref.make<ReadonlyArray<WorkoutRecord>>([]);
      // Set by a failed load; appends are refused until a later load succeeds
      const corruption = yield* Ref.make<Option.Option<CorruptStore>>(Option.none());
      const tempFile = `${file}.tmp`;

      const writeDurably = (target: string, content: string) =>
        Effect.scoped(
          Effect.gen(function* () {
            const handle = yield* fs.open(target, { flag: "w" });
            yield* handle.writeAll(new TextEncoder().encode(content));
            yield* handle.sync;
          }),
        );

      const load = () =>
        Effect.gen(function* () {
          if (!(yield* fs.exists(file))) {
            yield* Ref.set(records, []);
            yield* Ref.set(corruption, Option.none());
            return [];
          }

          const content = yield* fs.readFileString(file);
          const decoded = decodeStore(content);
          if (Either.isLeft(decoded)) {
            return yield* Effect.fail(
              new CorruptStore({
                message: `${file} does not contain a valid workout list. Fix or move the file and try again.`,
                path: file,
                cause: decoded.left,
              }),
            );
          }

          yield* Ref.set(records, decoded.right);
          yield* Ref.set(corruption, Option.none());
          return decoded.right;
        }).pipe(
          Effect.catchAll((error) =>
            Effect.fail(
              error instanceof CorruptStore
                ? error
                : new CorruptStore({
                    message: `${file} could not be read. Check that it is a readable file.`,
                    path: file,
                    cause: error,
                  }),
            ),
          ),
          Effect.tapError((error) => Ref.set(corruption, Option.some(error))),
        );

      // Write and sync the whole next sequence beside the data file, then rename
      // it into place. Memory only advances once the rename has landed.
      const append = (record: WorkoutRecord) =>
        Effect.gen(function* () {
          const failed = yield* Ref.get(corruption);
          if (Option.isSome(failed)) return yield* Effect.fail(failed.value);

          const next = [...(yield* Ref.get(records)), record];

          yield* fs.makeDirectory(path.dirname(file), { recursive: true }).pipe(
            Effect.zipRight(writeDurably(tempFile, encodeStore(next))),
            Effect.zipRight(fs.rename(tempFile, file)),
            // best-effort cleanup; the write error is what gets reported
            Effect.tapError(() => Effect.ignore(fs.remove(tempFile))),
            Effect.mapError(
              (cause) =>
                new WriteFailure({
                  message: `Could not save workouts to ${file}. Your previous history is unchanged.`,
                  path: file,
                  cause,
                }),
            ),
          );

          yield* Ref.set(records, next);
        });

      const listAll = () => Effect.map(Ref.get(records), newestFirst);

      const filterByType = (type: WorkoutType) =>
        Effect.map(listAll(), (all) => all.filter((r) => r.type === type));

      yield* load();

      return { load, append, listAll, filterByType };
    }),
  );
