import { describe, expect, test } from "vitest";
import {
  ColumnSelectionError,
  NameRepairError,
  Table,
  all_of,
  any_of,
  contains,
  describeRenames,
  ends_with,
  everything,
  matches,
  not,
  repair_names,
  resolve_columns,
  resolve_names,
  span,
  starts_with,
  where,
} from "../src/index";

describe("repair_names", () => {
  test("minimal keeps duplicates and blanks missing names", () => {
    expect(repair_names(["a", null, "a"], "minimal")).toEqual({ names: ["a", "", "a"], renamed: [] });
  });

  test("unique suffixes duplicates with their position", () => {
    const out = repair_names(["a", "a", "b"], "unique");
    expect(out.names).toEqual(["a...1", "a...2", "b"]);
    expect(out.renamed).toEqual([
      { position: 0, from: "a", to: "a...1" },
      { position: 1, from: "a", to: "a...2" },
    ]);
  });

  test("unique strips stale suffixes and fills empty names", () => {
    expect(repair_names(["a...3", "b"], "unique").names).toEqual(["a", "b"]);
    expect(repair_names(["", "x", "..."], "unique").names).toEqual(["...1", "x", "...3"]);
  });

  test("unique_quiet repairs without reporting", () => {
    expect(repair_names(["a", "a"], "unique_quiet")).toEqual({ names: ["a...1", "a...2"], renamed: [] });
  });

  test("check_unique lists the duplicated names", () => {
    expect(() => repair_names(["a", "b", "a"], "check_unique")).toThrow(
      "Names must be unique; duplicated: `a`. Use `names_repair` to specify how to repair."
    );
    expect(() => repair_names(["a", ""], "check_unique")).toThrow(NameRepairError);
    expect(() => repair_names(["..1"], "check_unique")).toThrow(NameRepairError);
  });

  test("check_unique reports the names on the error", () => {
    try {
      repair_names(["x", "x"], "check_unique", "name_repair");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NameRepairError);
      if (error instanceof NameRepairError) {
        expect(error.names).toEqual(["x"]);
        expect(error.message).toContain("Use `name_repair`");
      }
    }
  });

  test("a repair function must keep the length", () => {
    expect(repair_names(["a", "b"], (names) => names.map((name) => name.toUpperCase())).names).toEqual([
      "A",
      "B",
    ]);
    expect(() => repair_names(["a", "b"], (names) => names.slice(1))).toThrow(NameRepairError);
  });

  test("describeRenames lists each rename", () => {
    const { renamed } = repair_names(["a", "a"], "unique");
    expect(describeRenames(renamed)).toBe("New names:\n* `a` -> `a...1`\n* `a` -> `a...2`");
  });
});

describe("column selectors", () => {
  const table = new Table({ alpha: [1], beta: [2], gamma: ["x"] });

  test("names, positions and arrays resolve in first-seen order", () => {
    expect(resolve_columns(table, ["beta", 0, "beta"])).toEqual([1, 0]);
    expect(resolve_names(table, everything())).toEqual(["alpha", "beta", "gamma"]);
  });

  test("pattern helpers", () => {
    expect(resolve_names(table, starts_with("a"))).toEqual(["alpha"]);
    expect(resolve_names(table, ends_with("a"))).toEqual(["alpha", "beta", "gamma"]);
    expect(resolve_names(table, contains("mm"))).toEqual(["gamma"]);
    expect(resolve_names(table, matches(/^b/u))).toEqual(["beta"]);
  });

  test("span runs in either direction", () => {
    expect(resolve_columns(table, span("beta", "gamma"))).toEqual([1, 2]);
    expect(resolve_columns(table, span("gamma", 0))).toEqual([2, 1, 0]);
  });

  test("where, not and predicates", () => {
    expect(resolve_names(table, where((column) => column.type === "text"))).toEqual(["gamma"]);
    expect(resolve_names(table, not("beta"))).toEqual(["alpha", "gamma"]);
    expect(resolve_names(table, (name, column) => name !== "alpha" && column.type === "integer")).toEqual([
      "beta",
    ]);
  });

  test("all_of requires every name, any_of skips unknown ones", () => {
    expect(() => resolve_columns(table, all_of(["alpha", "zz"]))).toThrow("Column `zz` doesn't exist.");
    expect(resolve_names(table, any_of(["zz", "beta"]))).toEqual(["beta"]);
  });

  test("positions out of range are rejected", () => {
    expect(() => resolve_columns(table, 3)).toThrow(ColumnSelectionError);
  });

  test("required selections must match something", () => {
    expect(resolve_columns(table, starts_with("zz"))).toEqual([]);
    expect(() =>
      resolve_columns(table, starts_with("zz"), { arg: "names_from", required: true })
    ).toThrow("`names_from` must select at least one column.");
  });
});
