import { Schema, Validated } from "@jsonable/runtime";
import { boundaries } from "./boundaries";
import { NumbersSchema } from "./consumers";

/**
 * Method-style consumer: `record` is a boundary, `total` is not.
 */
export class Ledger {
  private readonly entries: number[] = [];

  @Validated(boundaries)
  @Schema(NumbersSchema)
  record(amounts: Iterable<number>): number {
    for (const amount of amounts) {
      this.entries.push(amount);
    }
    return this.total();
  }

  total(): number {
    return this.entries.reduce((sum, n) => sum + n, 0);
  }
}
