import { t } from "strata-types";
import { describe, expect, it } from "vitest";
import { parseConfig } from "../config";
import { Declarations, type ComputedDeclaration, type OwnDeclarations } from "../declarations";
import { ALL_KEYS, DependencyGraph } from "../dependency-graph";
import { CycleError, DeclarationError } from "../errors";

const member = (name: string, deps: ComputedDeclaration["deps"]): ComputedDeclaration => ({
  name,
  deps,
  cache: true,
  produce: () => undefined,
});

const graphOf = (...members: ComputedDeclaration[]) =>
  new DependencyGraph(new Map(members.map((declaration) => [declaration.name, declaration])), "Graph");

const own = (overrides: Partial<OwnDeclarations>): OwnDeclarations => ({
  fields: new Map(),
  computed: new Map(),
  checks: [],
  config: {},
  ...overrides,
});

describe("DependencyGraph", () => {
  const graph = graphOf(
    member("summed", ["a", "b"]),
    member("doubled", ["summed"]),
    member("everything", ALL_KEYS)
  );

  it("walks reverse edges transitively and includes wildcard members", () => {
    expect(graph.affectedBy("a")).toEqual(["summed", "everything", "doubled"]);
    expect(graph.affectedBy("summed")).toEqual(["doubled", "everything"]);
    expect(graph.affectedBy("unrelated")).toEqual(["everything"]);
  });

  it("memoizes the affected set of each key", () => {
    expect(graph.affectedBy("b")).toBe(graph.affectedBy("b"));
  });

  it("shares one frozen result between keys nothing depends on", () => {
    const unrelated = graph.affectedBy("user-17");
    expect(graph.affectedBy("user-18")).toBe(unrelated);
    expect(unrelated).toEqual(["everything"]);
    expect(Object.isFrozen(unrelated)).toBe(true);
  });

  it("lists direct dependents", () => {
    expect(graph.dependentsOf("summed")).toEqual(["doubled"]);
    expect(graph.dependentsOf("doubled")).toEqual([]);
  });

  it("visits every member once in a diamond", () => {
    const diamond = graphOf(member("left", ["a"]), member("right", ["a"]), member("top", ["left", "right"]));
    expect(diamond.affectedBy("a")).toEqual(["left", "right", "top"]);
  });

  it("is empty for keys nothing depends on", () => {
    expect(graphOf(member("x", ["a"])).affectedBy("b")).toEqual([]);
  });

  it("detects cycles when it is built", () => {
    expect(() => graphOf(member("x", ["y"]), member("y", ["x"]))).toThrow(CycleError);
    expect(() => graphOf(member("x", ["y"]), member("y", ["x"]))).toThrow(
      "computed members of Graph depend on each other in a cycle: x -> y -> x"
    );
  });

  it("reports the members on the cycle", () => {
    try {
      graphOf(member("start", ["loop"]), member("loop", ["back"]), member("back", ["loop"]));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CycleError);
      if (error instanceof CycleError) {
        expect(error.cycle).toEqual(["loop", "back", "loop"]);
      }
    }
  });

  it("detects members depending on themselves", () => {
    expect(() => graphOf(member("self", ["self"]))).toThrow("cycle: self -> self");
  });
});

describe("Declarations", () => {
  const root = Declarations.root("Strata");
  const notReserved = () => false;

  it("rejects dependencies on unknown members", () => {
    const computed = new Map([["total", member("total", ["missing"])]]);
    expect(() => root.derive("Orphan", own({ computed }), notReserved)).toThrow(
      'Orphan.total depends on "missing", which is neither a field nor a computed member'
    );
  });

  it("rejects cycles when the type is declared", () => {
    const computed = new Map([
      ["x", member("x", ["y"])],
      ["y", member("y", ["x"])],
    ]);
    expect(() => root.derive("Loop", own({ computed }), notReserved)).toThrow(CycleError);
  });

  it("inherits members, checks and configuration", () => {
    const fields = new Map([["a", { name: "a", type: t.integer, initial: null, required: true }]]);
    const parent = root.derive("Parent", own({ fields, config: { strict: true } }), notReserved);
    const child = parent.derive(
      "Child",
      own({ computed: new Map([["twice", member("twice", ["a"])]]), config: { coerce: true } }),
      notReserved
    );

    expect([...child.fields.keys()]).toEqual(["a"]);
    expect(child.config).toEqual({ strict: true, allowExtra: true, coerce: true, enforceJson: false, autoConvert: true });
    expect(child.graph.affectedBy("a")).toEqual(["twice"]);
    expect(child.parent).toBe(parent);
    expect(Object.isFrozen(child)).toBe(true);
  });
});

describe("parseConfig", () => {
  it("keeps only the options given", () => {
    expect(parseConfig({ strict: true, coerce: undefined }, "Cfg")).toEqual({ strict: true });
  });

  it("rejects values that are not booleans", () => {
    expect(() => parseConfig({ strict: "yes" }, "Cfg")).toThrow(DeclarationError);
    expect(() => parseConfig({ strict: "yes" }, "Cfg")).toThrow(
      "invalid configuration for Cfg: strict: Expected boolean, received string"
    );
  });

  it("rejects unknown options", () => {
    expect(() => parseConfig({ verbose: true }, "Cfg")).toThrow(
      "invalid configuration for Cfg: config: Unrecognized key(s) in object: 'verbose'"
    );
  });
});
