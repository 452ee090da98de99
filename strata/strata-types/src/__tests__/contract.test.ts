import { describe, expect, it, vi } from "vitest";
import { typechecked } from "../contract";
import { TypeMismatchError } from "../errors";
import { t } from "../expressions";

describe("typechecked", () => {
  const area = typechecked(
    { params: [["width", t.number], ["height", t.number]], returns: t.number },
    (width: unknown, height: unknown) => Number(width) * Number(height)
  );

  it("returns exactly what the wrapped function returns", () => {
    const result = { ok: true };
    const wrapped = typechecked({ returns: t.dict(t.boolean) }, () => result);
    expect(wrapped()).toBe(result);
    expect(area(2, 3)).toBe(6);
  });

  it("rejects a bad argument before the call", () => {
    const body = vi.fn((amount: unknown) => amount);
    const pay = typechecked({ params: [["amount", t.integer]] }, body);

    expect(() => pay("5")).toThrow(TypeMismatchError);
    expect(() => pay("5")).toThrow('argument "amount" expected integer, got string "5"');
    expect(body).not.toHaveBeenCalled();
  });

  it("never coerces arguments", () => {
    expect(() => area(2, "3")).toThrow('argument "height" expected number, got string "3"');
  });

  it("checks missing trailing arguments as undefined", () => {
    const greet = typechecked(
      { params: [["name", t.string], ["title", t.optional(t.string)]] },
      (name: string, title?: string) => (title ? `${title} ${name}` : name)
    );
    expect(greet("Ada")).toBe("Ada");
    expect(greet("Ada", "Dr.")).toBe("Dr. Ada");

    const strictArea = typechecked({ params: [["width", t.number]] }, (width?: number) => width);
    expect(() => strictArea()).toThrow('argument "width" expected number, got undefined');
  });

  it("checks extra arguments against rest", () => {
    const count = typechecked(
      { params: [["label", t.string]], rest: t.integer },
      (label: string, ...values: unknown[]) => `${label}:${values.length}`
    );
    expect(count("n", 1, 2)).toBe("n:2");
    expect(() => count("n", 1, "x")).toThrow('argument "rest[1]" expected integer, got string "x"');
  });

  it("passes extra arguments through without rest", () => {
    const first = typechecked({ params: [["value", t.integer]] }, (...values: unknown[]) => values.length);
    expect(first(1, "extra", null)).toBe(3);
  });

  it("rejects a bad return value", () => {
    const broken = typechecked({ name: "broken", returns: t.string }, (): unknown => 42);
    expect(() => broken()).toThrow('return value of broken expected string, got number 42');

    try {
      broken();
    } catch (error) {
      expect(error).toBeInstanceOf(TypeMismatchError);
      if (error instanceof TypeMismatchError) {
        expect(error.role).toBe("return");
        expect(error.actual).toBe(42);
      }
    }
  });

  it("keeps the wrapped function's name and receiver", () => {
    const counter = {
      step: 2,
      advance: typechecked({ params: [["from", t.integer]] }, function advance(this: { step: number }, from: number) {
        return from + this.step;
      }),
    };
    expect(counter.advance.name).toBe("advance");
    expect(counter.advance(1)).toBe(3);
  });

  describe("as a method decorator", () => {
    class Account {
      balance = 0;

      @typechecked.method({ params: [["amount", t.number]], returns: t.number })
      deposit(amount: unknown): number {
        this.balance += Number(amount);
        return this.balance;
      }

      @typechecked.method({ returns: t.integer })
      average(): unknown {
        return this.balance / 3;
      }
    }

    it("checks arguments and binds this", () => {
      const account = new Account();
      expect(account.deposit(10)).toBe(10);
      expect(() => account.deposit("5")).toThrow('argument "amount" expected number, got string "5"');
      expect(account.balance).toBe(10);
    });

    it("names the method in return errors", () => {
      const account = new Account();
      account.deposit(10);
      expect(() => account.average()).toThrow(/^return value of average expected integer, got number 3\.33/);
    });
  });
});
