/**
 * Capabilities the canonicalizer recognizes on values that JSON cannot
 * express directly. Checked in declaration order; the first match wins.
 */

/** Renders itself as ISO-8601 text, e.g. `Date`. */
export interface Timestamped {
  toISOString(): string;
}

/** Supplies its own interchange representation. */
export interface CustomSerializable {
  toJSON(): unknown;
}

/**
 * A one-argument function whose argument is meant to cross a component
 * boundary as JSON.
 */
export type Consumer<A = never, R = unknown> = (jsonable: A) => R;
