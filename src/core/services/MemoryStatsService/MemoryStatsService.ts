/**
 * MemoryStatsService - wraps the available-memory reading for testability.
 *
 * Live implementation uses node:os. The reading is approximate and racy
 * against the real system state; callers treat it as a hint.
 */

import { Context, Data, Effect, Layer, Option, pipe } from "effect";
import { freemem } from "node:os";

export class MemoryStatsUnavailable extends Data.TaggedError("MemoryStatsUnavailable")<{
  readonly reason: string;
}> {}

export interface MemoryStatsService {
  /** Available bytes, or None when the platform gave an unusable value. */
  readonly available: Effect.Effect<Option.Option<number>, MemoryStatsUnavailable>;
}

export class MemoryStatsServiceTag extends Context.Tag("MemoryStatsService")<
  MemoryStatsServiceTag,
  MemoryStatsService
>() {}

const isUsableReading = (bytes: number): boolean => Number.isFinite(bytes) && bytes >= 0;

export const MemoryStatsServiceLive = Layer.succeed(MemoryStatsServiceTag, {
  available: pipe(
    Effect.try({
      try: () => freemem(),
      catch: (e) => new MemoryStatsUnavailable({ reason: String(e) })
    }),
    Effect.map(Option.liftPredicate(isUsableReading))
  )
});

/** Fixed reading, for tests and for forcing one buffer variant. */
export const MemoryStatsServiceFixed = (bytes: number | undefined) =>
  Layer.succeed(MemoryStatsServiceTag, {
    available: Effect.succeed(Option.fromNullable(bytes))
  });
