import { describe, expect, it } from "vitest";
import { Coercer, coerce } from "../coercer";
import { CoercionError } from "../errors";
import { t, type Typed } from "../expressions";
import { TypeChecker } from "../matcher";

class Point {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}
}

const pointType = t.instanceOf(Point, {
  fromMapping: (entries) => new Point(coerce(entries.x, t.number), coerce(entries.y, t.number)),
});

const failureOf = (run: () => unknown): CoercionError => {
  try {
    run();
  } catch (error) {
    if (error instanceof CoercionError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a CoercionError");
};

describe("coerce", () => {
  it("returns conforming values unchanged", () => {
    const tags = ["a", "b"];
    expect(coerce(tags, t.list(t.string))).toBe(tags);
    expect(coerce(5, t.integer)).toBe(5);
  });

  describe("integers", () => {
    it("parses integer strings", () => {
      expect(coerce("5", t.integer)).toBe(5);
      expect(coerce(" -42 ", t.integer)).toBe(-42);
    });

    it("accepts safe bigints", () => {
      expect(coerce(7n, t.integer)).toBe(7);
    });

    it("rejects fractional numbers and booleans", () => {
      expect(failureOf(() => coerce(3.7, t.integer)).reason).toBe("number has a fractional part");
      expect(failureOf(() => coerce(true, t.integer)).reason).toBe("no conversion to integer");
      expect(failureOf(() => coerce("3.5", t.integer)).reason).toBe("string is not an integer");
    });

    it("rejects integers beyond the safe range", () => {
      expect(failureOf(() => coerce("9007199254740993", t.integer)).reason).toBe("integer is outside the safe range");
      expect(failureOf(() => coerce(2 ** 60, t.integer)).reason).toBe("integer is outside the safe range");
    });
  });

  it("parses numbers from decimal strings and bigints", () => {
    expect(coerce("2.5", t.number)).toBe(2.5);
    expect(coerce("1e3", t.number)).toBe(1000);
    expect(coerce(10n, t.number)).toBe(10);
    expect(failureOf(() => coerce("abc", t.number)).reason).toBe("string is not a number");
  });

  it("stringifies numbers and booleans only", () => {
    expect(coerce(12, t.string)).toBe("12");
    expect(coerce(false, t.string)).toBe("false");
    expect(coerce(3n, t.string)).toBe("3");
    expect(failureOf(() => coerce(null, t.string)).reason).toBe("only numbers and booleans convert to strings");
  });

  it("reads boolean words", () => {
    expect(coerce("Yes", t.boolean)).toBe(true);
    expect(coerce(" off ", t.boolean)).toBe(false);
    expect(coerce("1", t.boolean)).toBe(true);
    expect(coerce(0, t.boolean)).toBe(false);
    expect(failureOf(() => coerce(2, t.boolean)).reason).toBe("only 0 and 1 convert to booleans");
    expect(failureOf(() => coerce("maybe", t.boolean)).reason).toBe("string is not a boolean word");
  });

  it("builds bigints from integer strings and integral numbers", () => {
    expect(coerce("12", t.bigint)).toBe(12n);
    expect(coerce(4, t.bigint)).toBe(4n);
  });

  it("never produces none", () => {
    expect(failureOf(() => coerce("", t.none)).reason).toBe("nothing converts to none");
  });

  describe("containers", () => {
    it("coerces sequences element-wise", () => {
      expect(coerce(["1", "2"], t.list(t.integer))).toEqual([1, 2]);
      expect(coerce(new Set(["3"]), t.list(t.integer))).toEqual([3]);
    });

    it("reports the failing element and leaves nothing half-converted", () => {
      const error = failureOf(() => coerce(["1", "x"], t.list(t.integer)));
      expect(error.path).toEqual([1]);
      expect(error.message).toBe('cannot coerce string "x" to integer at [1]: string is not an integer');
    });

    it("does not split strings into sequences", () => {
      expect(failureOf(() => coerce("abc", t.list(t.string))).reason).toBe("expected an array or a set");
    });

    it("builds sets", () => {
      expect(coerce([1, 1, 2], t.set(t.integer))).toEqual(new Set([1, 2]));
    });

    it("coerces tuples positionally", () => {
      expect(coerce(["1", "a"], t.tuple(t.integer, t.string))).toEqual([1, "a"]);
      expect(failureOf(() => coerce([1], t.tuple(t.integer, t.string))).reason).toBe("expected 2 elements, got 1");
    });

    it("keeps the mapping flavour of the input", () => {
      expect(coerce({ a: "1" }, t.dict(t.integer))).toEqual({ a: 1 });
      expect(coerce(new Map([["a", "1"]]), t.dict(t.integer))).toEqual(new Map([["a", 1]]));
    });

    it("returns a Map when coerced keys are not strings", () => {
      expect(coerce({ "1": "x" }, t.dict(t.string, t.integer))).toEqual(new Map([[1, "x"]]));
    });

    it("accepts key/value pairs", () => {
      expect(coerce([["a", "1"]], t.dict(t.integer))).toEqual({ a: 1 });
      expect(failureOf(() => coerce([["a", "1", "2"]], t.dict(t.integer))).reason).toBe(
        "expected a mapping or an iterable of key/value pairs"
      );
    });

    it("prefixes nested failures with their key", () => {
      const error = failureOf(() => coerce({ scores: { math: "A" } }, t.dict(t.dict(t.integer))));
      expect(error.path).toEqual(["scores", "math"]);
    });
  });

  describe("unions", () => {
    it("takes the first alternative that converts", () => {
      expect(coerce("7", t.union(t.integer, t.boolean))).toBe(7);
      expect(coerce("1", t.union(t.boolean, t.integer))).toBe(true);
    });

    it("aggregates every alternative's failure", () => {
      const error = failureOf(() => coerce("x", t.optional(t.integer)));
      expect(error.failures).toHaveLength(2);
      expect(error.reason).toBe("no alternative accepted the value (string is not an integer; nothing converts to none)");
    });
  });

  it("maps values onto literals", () => {
    expect(coerce("2", t.literal(1, 2))).toBe(2);
    expect(coerce(1, t.literal("1", "2"))).toBe("1");
    expect(failureOf(() => coerce("3", t.literal(1, 2))).reason).toBe("matches none of the literal values");
  });

  describe("class instances", () => {
    it("builds instances from mappings", () => {
      const point = coerce({ x: "1", y: 2 }, pointType);
      expect(point).toBeInstanceOf(Point);
      expect(point.x).toBe(1);
      expect(point.y).toBe(2);
    });

    it("wraps failures of the factory", () => {
      const error = failureOf(() => coerce({ x: "left", y: 2 }, pointType));
      expect(error.cause).toBeInstanceOf(CoercionError);
      expect(error.expected).toBe(pointType);
    });

    it("refuses classes without a factory", () => {
      expect(failureOf(() => coerce({ x: 1, y: 2 }, t.instanceOf(Point))).reason).toBe(
        "class cannot be built from a mapping"
      );
    });
  });

  it("is idempotent", () => {
    const cases: [unknown, Typed<unknown>][] = [
      ["5", t.integer],
      ["2.5", t.number],
      [7, t.string],
      ["on", t.boolean],
      ["12", t.bigint],
    ];
    for (const [value, expr] of cases) {
      const once = coerce(value, expr);
      expect(coerce(once, expr)).toBe(once);
    }
  });

  it("uses the checker it was given", () => {
    const lenient = new Coercer(new TypeChecker({ booleanAsInteger: true }));
    expect(lenient.coerce(true, t.integer)).toBe(true);
  });
});
