import { Type } from "@sinclair/typebox";
import type { Static } from "@sinclair/typebox";
import { Schema } from "@jsonable/runtime";
import { validated } from "./boundaries";

export const NumberSchema = Type.Number();
export const NumbersSchema = Type.Array(Type.Number());
export const StampedLabelSchema = Type.Object({
  at: Type.String({ format: "date-time" }),
  label: Type.String(),
});

// ── Valid consumers ──────────────────────────────────────────────

export const numberConsumer = validated(
  Schema(NumberSchema)(function numberConsumer(jsonable: Static<typeof NumberSchema>) {
    return jsonable * 2;
  }),
);

/** Values seen by {@link numberConsumerNoReturn}. */
export const sideEffects: number[] = [];

export const numberConsumerNoReturn = validated(
  Schema(NumberSchema)(function numberConsumerNoReturn(jsonable: number): void {
    sideEffects.push(jsonable);
  }),
);

export const seqConsumer = validated(
  Schema(NumbersSchema)(function seqConsumer(jsonable: Iterable<number>) {
    return Array.from(jsonable, x => x * 2);
  }),
);

export const stampedLabelConsumer = validated(
  Schema(StampedLabelSchema)(function stampedLabelConsumer(jsonable: { at: Date | string; label: string }) {
    const day = new Date(jsonable.at).toISOString().slice(0, 10);
    return `${jsonable.label}@${day}`;
  }),
);

// ── Consumers that break the boundary ────────────────────────────

/** Something with hidden behavior that a plain number lacks. */
export interface Scalable {
  times(factor: number): number;
}

/**
 * Accepts anything that serializes to a number, but doubles rich values
 * through their own `times()`, which a round-tripped copy does not have.
 */
export const scaleConsumer = validated(
  Schema(NumberSchema)(function scaleConsumer(jsonable: number | Scalable): number {
    return typeof jsonable === "number" ? jsonable * 2 : jsonable.times(2);
  }),
);

/** Returns a class object instead of data. */
export const numberConsumerBadReturn = validated(
  Schema(NumberSchema)(function numberConsumerBadReturn(_jsonable: number) {
    return Number;
  }),
);
