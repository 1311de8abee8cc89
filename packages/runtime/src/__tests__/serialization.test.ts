import { describe, it, expect } from "vitest";
import { JsonableSerializer, parse, roundtrip, stringify, toJsonable } from "../serialization";
import { TypeConversionError } from "../errors";

function* range(start: number, end: number): Generator<number> {
  for (let i = start; i < end; i++) {
    yield i;
  }
}

describe("toJsonable", () => {
  it("passes plain JSON data through", () => {
    const data = { a: [1, "two", true, null], b: { c: -0.5 } };
    expect(toJsonable(data)).toEqual(data);
  });

  it("converts values nested inside plain data", () => {
    expect(toJsonable({ at: new Date(0), tags: new Set(["x"]) })).toEqual({
      at: "1970-01-01T00:00:00.000Z",
      tags: ["x"],
    });
  });

  it("re-encodes what toJSON() returns", () => {
    const event = { toJSON: () => ({ at: new Date(0) }) };
    expect(toJsonable([event])).toEqual([{ at: "1970-01-01T00:00:00.000Z" }]);
  });

  it("maps undefined like JSON does", () => {
    expect(toJsonable(undefined)).toBeNull();
    expect(toJsonable([undefined])).toEqual([null]);
    expect(toJsonable({ a: undefined, b: 1 })).toEqual({ b: 1 });
  });

  it("unwraps boxed primitives", () => {
    expect(toJsonable(new String("hi"))).toBe("hi");
    expect(toJsonable(new Number(3))).toBe(3);
  });

  it("accepts objects without a prototype", () => {
    const bare: Record<string, unknown> = Object.create(null);
    bare.x = 1;
    expect(toJsonable(bare)).toEqual({ x: 1 });
  });

  it("allows the same object twice when it is not a cycle", () => {
    const shared = [1];
    expect(toJsonable({ a: shared, b: shared })).toEqual({ a: [1], b: [1] });
  });

  it("rejects circular references", () => {
    const node: Record<string, unknown> = {};
    node.self = node;
    expect(() => toJsonable(node)).toThrow(TypeConversionError);
    expect(() => toJsonable(node)).toThrow(/\(circular reference\)$/);
  });

  it("rejects non-finite numbers and bigints", () => {
    expect(() => toJsonable(Number.NaN)).toThrow(
      "Object of type number with value of NaN is not JSON serializable",
    );
    expect(() => toJsonable(10n)).toThrow(
      "Object of type bigint with value of 10n is not JSON serializable",
    );
  });

  it("rejects function-valued properties", () => {
    expect(() => toJsonable({ run: () => 1 })).toThrow(TypeConversionError);
  });

  it("rejects invalid dates nested in objects", () => {
    expect(() => toJsonable({ at: new Date("nope") })).toThrow(TypeConversionError);
  });
});

describe("stringify / parse", () => {
  it("serializes nested iterables", () => {
    function* nested(): Generator<Generator<number>> {
      for (const x of range(0, 3)) {
        yield range(0, x + 1);
      }
    }

    const text = stringify(nested());
    expect(text).toBe("[[0],[0,1],[0,1,2]]");
    expect(parse(text)).toEqual([[0], [0, 1], [0, 1, 2]]);
  });
});

describe("roundtrip", () => {
  it("returns plain data", () => {
    expect(roundtrip(2)).toBe(2);
    expect(roundtrip(range(1, 3))).toEqual([1, 2]);
    expect(roundtrip({ when: new Date(86_400_000) })).toEqual({ when: "1970-01-02T00:00:00.000Z" });
  });

  it("returns a copy, not the input", () => {
    const input = { list: [1, 2] };
    const copy = roundtrip(input);
    expect(copy).toEqual(input);
    expect(copy).not.toBe(input);
  });

  it("rejects objects with methods instead of dropping them", () => {
    expect(() => roundtrip({ a: 1, run: () => 1 })).toThrow(
      "Object of type function with value of [Function: run] is not JSON serializable",
    );
  });

  it("loses behavior carried by the input", () => {
    class Celsius {
      constructor(readonly degrees: number) {}
      toFahrenheit(): number {
        return this.degrees * 1.8 + 32;
      }
    }
    // Class instances are not plain data and expose no capability.
    expect(() => roundtrip(new Celsius(10))).toThrow(
      "Object of type Celsius with value of Celsius { degrees: 10 } is not JSON serializable",
    );
  });
});

describe("JsonableSerializer", () => {
  it("applies its iterable limit", () => {
    const serializer = new JsonableSerializer({ maxIterableLength: 2 });
    expect(serializer.roundtrip(new Set([1, 2]))).toEqual([1, 2]);
    expect(() => serializer.stringify(range(0, 5))).toThrow(TypeConversionError);
  });

  it("leaves iterables unbounded by default", () => {
    const serializer = new JsonableSerializer();
    expect(serializer.toJsonable(range(0, 1000))).toHaveLength(1000);
  });
});
