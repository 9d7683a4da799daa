import { describe, expect, test } from "vitest";
import {
  ColumnSelectionError,
  NameRepairError,
  SpecError,
  Table,
  ValuesFillError,
  ValuesFnError,
  build_wider_spec,
  check_spec,
  factor,
  integer,
  pivot_wider,
  pivot_wider_spec,
  real,
  starts_with,
  text,
  type PivotWarning,
} from "../src/index";

function specOf(names: string[], values: string[], keys: Record<string, string[]>): Table {
  return new Table({ ".name": names, ".value": values, ...keys });
}

describe("pivot_wider basics", () => {
  test("spreads one value per id and key", () => {
    const long = new Table({ id: [1, 2], k: ["x", "y"], v: [1, 2] });
    const { table, warnings } = pivot_wider(long, { names_from: "k", values_from: "v" });

    expect(table.columns).toEqual(["id", "x", "y"]);
    expect(table.to_records()).toEqual([
      { id: 1, x: 1, y: null },
      { id: 2, x: null, y: 2 },
    ]);
    expect(table.types()).toEqual(["integer", "integer", "integer"]);
    expect(warnings).toEqual([]);
  });

  test("defaults read from `name` and `value`", () => {
    const long = new Table({ key: ["a", "a"], name: ["x", "y"], value: [1.5, 2.5] });
    expect(pivot_wider(long).table.to_records()).toEqual([{ key: "a", x: 1.5, y: 2.5 }]);
  });

  test("id rows follow first appearance", () => {
    const long = new Table({ id: [2, 1, 2], k: ["x", "x", "y"], v: [1, 2, 3] });
    expect(pivot_wider(long, { names_from: "k", values_from: "v" }).table.to_records()).toEqual([
      { id: 2, x: 1, y: 3 },
      { id: 1, x: 2, y: null },
    ]);
  });

  test("without id columns every row feeds one output row", () => {
    const long = new Table({ k: ["x", "y"], v: [1, 2] });
    const { table } = pivot_wider(long, { names_from: "k", values_from: "v" });
    expect(table.to_records()).toEqual([{ x: 1, y: 2 }]);
  });

  test("explicit id_cols drop the other columns", () => {
    const long = new Table({ id: [1, 1], note: ["p", "q"], k: ["x", "y"], v: [1, 2] });
    const { table } = pivot_wider(long, { id_cols: "id", names_from: "k", values_from: "v" });
    expect(table.to_records()).toEqual([{ id: 1, x: 1, y: 2 }]);
  });

  test("id_cols may not reuse a names or values column", () => {
    const long = new Table({ id: [1], k: ["x"], v: [1] });
    expect(() => pivot_wider(long, { id_cols: ["id", "k"], names_from: "k", values_from: "v" })).toThrow(
      ColumnSelectionError
    );
  });

  test("names_from and values_from must select something", () => {
    const long = new Table({ id: [1], k: ["x"], v: [1] });
    expect(() => pivot_wider(long, { names_from: starts_with("zz"), values_from: "v" })).toThrow(
      "`names_from` must select at least one column."
    );
    expect(() => pivot_wider(long, { names_from: "k", values_from: [] })).toThrow(
      "`values_from` must select at least one column."
    );
  });
});

describe("duplicate keys", () => {
  const long = new Table({ id: [1, 1], k: ["x", "x"], v: [1, 2] });

  test("collect into a list column with one warning", () => {
    const { table, warnings } = pivot_wider(long, { names_from: "k", values_from: "v" });

    expect(table.types()).toEqual(["integer", "list"]);
    expect(table.to_records()).toEqual([{ id: 1, x: [1, 2] }]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({
      kind: "values_not_unique",
      values_from: "v",
      columns: ["x"],
      duplicates: 1,
    });
    expect(warnings[0]?.message).toContain("Values from `v` are not uniquely identified");
  });

  test("on_warning receives each warning", () => {
    const seen: PivotWarning[] = [];
    const { warnings } = pivot_wider(long, {
      names_from: "k",
      values_from: "v",
      on_warning: (warning) => seen.push(warning),
    });
    expect(seen).toEqual(warnings);
  });

  test("an aggregation removes the warning", () => {
    const { table, warnings } = pivot_wider(long, { names_from: "k", values_from: "v", values_fn: "sum" });
    expect(table.to_records()).toEqual([{ id: 1, x: 3 }]);
    expect(table.types()).toEqual(["integer", "integer"]);
    expect(warnings).toEqual([]);
  });

  test("only the affected values column becomes a list column", () => {
    const wide = new Table({ id: [1, 1, 1], k: ["x", "x", "y"], a: [1, 2, 3], b: [4, 5, 6] });
    const { table, warnings } = pivot_wider(wide, {
      names_from: "k",
      values_from: ["a", "b"],
      values_fn: { a: "max" },
    });

    expect(table.columns).toEqual(["id", "a_x", "a_y", "b_x", "b_y"]);
    expect(table.types()).toEqual(["integer", "integer", "integer", "list", "list"]);
    expect(table.to_records()).toEqual([{ id: 1, a_x: 2, a_y: 3, b_x: [4, 5], b_y: [6] }]);
    expect(warnings.map((warning) => [warning.values_from, warning.columns])).toEqual([["b", ["b_x", "b_y"]]]);
  });
});

describe("values_fn", () => {
  const long = new Table({ id: [1, 1, 2], k: ["x", "x", "x"], v: [1, 4, 6] });

  test("runs on singleton groups as well", () => {
    const { table } = pivot_wider(long, {
      names_from: "k",
      values_from: "v",
      values_fn: (values) => values.length,
    });
    expect(table.get("x")).toEqual([2, 1]);
  });

  test("named aggregations", () => {
    const run = (values_fn: "mean" | "min" | "count" | "first" | "last" | "list") =>
      pivot_wider(long, { names_from: "k", values_from: "v", values_fn }).table.get("x");

    expect(run("mean")).toEqual([2.5, 6]);
    expect(run("min")).toEqual([1, 6]);
    expect(run("count")).toEqual([2, 1]);
    expect(run("first")).toEqual([1, 6]);
    expect(run("last")).toEqual([4, 6]);
    expect(run("list")).toEqual([[1, 4], [6]]);
  });

  test("mean always gives reals", () => {
    const even = new Table({ id: [1, 1], k: ["x", "x"], v: [2, 4] });
    const { table } = pivot_wider(even, { names_from: "k", values_from: "v", values_fn: "mean" });
    expect(table.types()).toEqual(["integer", "real"]);
    expect(table.get("x")).toEqual([3]);
  });

  test("list aggregation keeps the source type inside each cell", () => {
    const single = new Table({ id: [1], k: ["x"], v: [7] });
    const x = pivot_wider(single, { names_from: "k", values_from: "v", values_fn: "list" }).table.column("x");
    expect(x.type).toBe("list");
    expect(x.type === "list" ? x.values[0]?.type : undefined).toBe("integer");
  });

  test("zero input rows take the aggregation's result type", () => {
    const empty = Table.from_columns(["id", "k", "v"], [integer([]), text([]), text([])]);
    const spec = specOf(["x"], ["v"], { k: ["x"] });
    const typesFor = (values_fn: "list" | "count" | "first") =>
      pivot_wider_spec(empty, spec, { values_fn }).table.types();

    expect(typesFor("list")).toEqual(["integer", "list"]);
    expect(typesFor("count")).toEqual(["integer", "integer"]);
    expect(typesFor("first")).toEqual(["integer", "text"]);
  });

  test("list aggregation does not warn", () => {
    expect(pivot_wider(long, { names_from: "k", values_from: "v", values_fn: "list" }).warnings).toEqual([]);
  });

  test("rejects values that aren't functions before any work", () => {
    expect(() =>
      Reflect.apply(pivot_wider, undefined, [long, { names_from: "k", values_from: "v", values_fn: 1 }])
    ).toThrow(ValuesFnError);
    expect(() =>
      Reflect.apply(pivot_wider, undefined, [long, { names_from: "k", values_from: "v", values_fn: "median" }])
    ).toThrow('unknown aggregation "median"');
  });

  test("rejects results that aren't a single summary value", () => {
    expect(() =>
      Reflect.apply(pivot_wider, undefined, [
        long,
        { names_from: "k", values_from: "v", values_fn: () => ({ total: 1 }) },
      ])
    ).toThrow("must result in a single summary value per key");
  });
});

describe("values_fill", () => {
  const long = new Table({ id: [1, 2], k: ["x", "y"], v: [1, null] });

  test("fills only absent cells", () => {
    const { table } = pivot_wider(long, { names_from: "k", values_from: "v", values_fill: 0 });
    expect(table.to_records()).toEqual([
      { id: 1, x: 1, y: 0 },
      { id: 2, x: 0, y: null },
    ]);
    expect(table.types()).toEqual(["integer", "integer", "integer"]);
  });

  test("a fractional fill widens integers to reals", () => {
    const { table } = pivot_wider(long, { names_from: "k", values_from: "v", values_fill: 0.5 });
    expect(table.types()).toEqual(["integer", "real", "real"]);
    expect(table.get("x")).toEqual([1, 0.5]);
  });

  test("per-column fills", () => {
    const wide = new Table({ id: [1, 2], k: ["x", "y"], a: [1, 2], b: ["p", "q"] });
    const { table } = pivot_wider(wide, {
      names_from: "k",
      values_from: ["a", "b"],
      values_fill: { b: "-" },
    });
    expect(table.to_records()).toEqual([
      { id: 1, a_x: 1, a_y: null, b_x: "p", b_y: "-" },
      { id: 2, a_x: null, a_y: 2, b_x: "-", b_y: "q" },
    ]);
  });

  test("a string fill adds a factor level", () => {
    const wide = new Table({ id: [1, 2], k: ["x", "y"], v: factor(["lo", "hi"]) });
    const { table } = pivot_wider(wide, { names_from: "k", values_from: "v", values_fill: "none" });
    const x = table.column("x");

    expect(x.type).toBe("factor");
    expect(x.type === "factor" ? x.levels : []).toEqual(["hi", "lo", "none"]);
    expect(table.get("x")).toEqual(["lo", "none"]);
  });

  test("a boolean values column stays boolean", () => {
    const flags = new Table({ id: [1, 1, 2], k: ["x", "y", "x"], v: [true, null, false] });
    const { table } = pivot_wider(flags, { names_from: "k", values_from: "v", values_fill: true });

    expect(table.types()).toEqual(["integer", "boolean", "boolean"]);
    expect(table.to_records()).toEqual([
      { id: 1, x: true, y: null },
      { id: 2, x: false, y: true },
    ]);
    expect(() => pivot_wider(flags, { names_from: "k", values_from: "v", values_fill: 0 })).toThrow(
      ValuesFillError
    );
  });

  test("a values column without any values takes the fill's type", () => {
    const blank = new Table({ id: [1, 2], k: ["x", "y"], v: [null, null] });
    const { table } = pivot_wider(blank, { names_from: "k", values_from: "v", values_fill: 0 });

    expect(table.types()).toEqual(["integer", "integer", "integer"]);
    expect(table.to_records()).toEqual([
      { id: 1, x: null, y: 0 },
      { id: 2, x: 0, y: null },
    ]);
  });

  test("incompatible fills are rejected", () => {
    expect(() => pivot_wider(long, { names_from: "k", values_from: "v", values_fill: "zero" })).toThrow(
      ValuesFillError
    );
    expect(() =>
      Reflect.apply(pivot_wider, undefined, [long, { names_from: "k", values_from: "v", values_fill: [0] }])
    ).toThrow(ValuesFillError);
  });
});

describe("output names", () => {
  const wide = new Table({ id: [1, 1], k: ["x", "y"], a: [1, 2], b: [3, 4] });

  test("several values columns vary fastest by default", () => {
    const { table } = pivot_wider(wide, { names_from: "k", values_from: ["a", "b"] });
    expect(table.columns).toEqual(["id", "a_x", "a_y", "b_x", "b_y"]);
    expect(table.to_records()).toEqual([{ id: 1, a_x: 1, a_y: 2, b_x: 3, b_y: 4 }]);
  });

  test("names_vary slowest groups by key", () => {
    const { table } = pivot_wider(wide, { names_from: "k", values_from: ["a", "b"], names_vary: "slowest" });
    expect(table.columns).toEqual(["id", "a_x", "b_x", "a_y", "b_y"]);
  });

  test("names_sep and names_prefix", () => {
    const { table } = pivot_wider(wide, {
      names_from: "k",
      values_from: ["a", "b"],
      names_sep: ".",
      names_prefix: "k",
    });
    expect(table.columns).toEqual(["id", "a.kx", "a.ky", "b.kx", "b.ky"]);
  });

  test("names_glue templates", () => {
    const { table } = pivot_wider(wide, {
      names_from: "k",
      values_from: ["a", "b"],
      names_glue: "{k}_{.value}{{!}}",
    });
    expect(table.columns).toEqual(["id", "x_a{!}", "y_a{!}", "x_b{!}", "y_b{!}"]);
  });

  test("unknown glue fields are a spec error", () => {
    try {
      pivot_wider(wide, { names_from: "k", values_from: "a", names_glue: "{nope}" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SpecError);
      expect(error instanceof SpecError ? error.reason : undefined).toBe("glue_field");
    }
  });

  test("several names columns join their values", () => {
    const long = new Table({ id: [1, 1], g: ["a", "b"], n: [1, 2], v: [true, false] });
    const { table } = pivot_wider(long, { names_from: ["g", "n"], values_from: "v" });
    expect(table.to_records()).toEqual([{ id: 1, a_1: true, b_2: false }]);
  });

  test("boolean keys render as TRUE and FALSE", () => {
    const long = new Table({ id: [1, 1], k: [true, false], v: [5, 6] });
    expect(pivot_wider(long, { names_from: "k", values_from: "v" }).table.columns).toEqual([
      "id",
      "TRUE",
      "FALSE",
    ]);
  });

  test("missing and date keys render as text", () => {
    const long = Table.from_columns(
      ["id", "k", "v"],
      [integer([1, 1]), { type: "date", values: [new Date(Date.UTC(2024, 0, 2)), null] }, integer([5, 6])]
    );
    expect(pivot_wider(long, { names_from: "k", values_from: "v" }).table.columns).toEqual([
      "id",
      "2024-01-02T00:00:00.000Z",
      "NA",
    ]);
  });
});

describe("names_sort and names_expand", () => {
  const long = new Table({
    id: [1, 1],
    k: factor(["a", "z"], { levels: ["z", "b", "a"] }),
    v: [1, 2],
  });

  test("unsorted names follow first appearance", () => {
    expect(pivot_wider(long, { names_from: "k", values_from: "v" }).table.columns).toEqual(["id", "a", "z"]);
  });

  test("names_sort follows factor level order", () => {
    const { table } = pivot_wider(long, { names_from: "k", values_from: "v", names_sort: true });
    expect(table.columns).toEqual(["id", "z", "a"]);
  });

  test("names_expand adds unused levels", () => {
    const { table } = pivot_wider(long, { names_from: "k", values_from: "v", names_expand: true });
    expect(table.columns).toEqual(["id", "z", "b", "a"]);
    expect(table.to_records()).toEqual([{ id: 1, z: 2, b: null, a: 1 }]);
  });

  test("names_sort on text sorts naturally with missing last", () => {
    const plain = new Table({ id: [1, 1, 1], k: ["b", null, "a"], v: [1, 2, 3] });
    const { table } = pivot_wider(plain, { names_from: "k", values_from: "v", names_sort: true });
    expect(table.columns).toEqual(["id", "a", "b", "NA"]);
  });
});

describe("names_repair", () => {
  test("a value column colliding with an id column is an error by default", () => {
    const long = new Table({ a: [1, 1], key: ["a", "b"], val: [1, 2] });
    expect(() => pivot_wider(long, { names_from: "key", values_from: "val" })).toThrow(NameRepairError);
  });

  test("unique renames and reports", () => {
    const long = new Table({ a: [1, 1], key: ["a", "b"], val: [1, 2] });
    const { table, warnings } = pivot_wider(long, {
      names_from: "key",
      values_from: "val",
      names_repair: "unique",
    });

    expect(table.columns).toEqual(["a...1", "a...2", "b"]);
    expect(table.values()).toEqual([[1, 1, 2]]);
    expect(warnings).toEqual([
      {
        kind: "names_repaired",
        columns: ["a...1", "a...2"],
        message: "New names:\n* `a` -> `a...1`\n* `a` -> `a...2`",
      },
    ]);
  });

  test("repair functions run after the spec is laid out", () => {
    const long = new Table({ test: ["a", "b"], name: ["test", "test2"], value: [1, 2] });
    const dedupe = (names: string[]): string[] =>
      names.map((name, position) => {
        const earlier = names.slice(0, position).filter((other) => other === name).length;
        return earlier === 0 ? name : `${name}.${earlier}`;
      });

    const { table } = pivot_wider(long, { names_repair: dedupe });
    expect(table.columns).toEqual(["test", "test.1", "test2"]);
    expect(table.get("test")).toEqual(["a", "b"]);
    expect(table.get("test.1")).toEqual([1, null]);
    expect(table.get("test2")).toEqual([null, 2]);
  });

  test("minimal keeps both columns", () => {
    const long = new Table({ test: ["a", "b"], name: ["test", "test2"], value: [1, 2] });
    const { table } = pivot_wider(long, { names_repair: "minimal" });

    expect(table.columns).toEqual(["test", "test", "test2"]);
    expect(table.get(0)).toEqual(["a", "b"]);
    expect(table.get(1)).toEqual([1, null]);
    expect(table.get(2)).toEqual([null, 2]);
  });
});

describe("grouped input", () => {
  test("group keys lead and rows come out group by group", () => {
    const long = new Table({ g: [2, 1], id: [1, 1], k: ["x", "x"], v: [5, 6] }).group_by("g");
    const { table } = pivot_wider(long, { id_cols: "id", names_from: "k", values_from: "v" });

    expect(table.groups).toEqual(["g"]);
    expect(table.to_records()).toEqual([
      { g: 1, id: 1, x: 6 },
      { g: 2, id: 1, x: 5 },
    ]);
  });
});

describe("specs", () => {
  test("build_wider_spec lays out name, value and keys", () => {
    const long = new Table({ id: [1, 1], k: ["x", "y"], v: [1, 2] });
    const spec = build_wider_spec(long, { names_from: "k", values_from: "v" });
    expect(spec.to_records()).toEqual([
      { ".name": "x", ".value": "v", k: "x" },
      { ".name": "y", ".value": "v", k: "y" },
    ]);
  });

  test("build_wider_spec without names columns", () => {
    const long = new Table({ id: [1, 2], v: [1, 2] });
    const spec = build_wider_spec(long, { names_from: [], values_from: "v" });
    expect(spec.to_records()).toEqual([{ ".name": "v", ".value": "v" }]);
    expect(pivot_wider_spec(long, spec).table.to_records()).toEqual([
      { id: 1, v: 1 },
      { id: 2, v: 2 },
    ]);
  });

  test("output columns follow spec order, unmatched keys give empty columns", () => {
    const long = new Table({ id: [1], k: ["x"], v: [5] });
    const spec = specOf(["zed", "ex"], ["v", "v"], { k: ["z", "x"] });
    const { table } = pivot_wider_spec(long, spec);

    expect(table.columns).toEqual(["id", "zed", "ex"]);
    expect(table.to_records()).toEqual([{ id: 1, zed: null, ex: 5 }]);
  });

  test("text keys in a spec match factor names columns", () => {
    const long = new Table({ id: [1], k: factor(["x"]), v: [5] });
    const spec = specOf(["out"], ["v"], { k: ["x"] });
    expect(pivot_wider_spec(long, spec).table.to_records()).toEqual([{ id: 1, out: 5 }]);
  });

  test("zero input rows give zero typed rows", () => {
    const long = Table.from_columns(["id", "k", "v"], [integer([]), text([]), real([])]);
    const spec = specOf(["x", "y"], ["v", "v"], { k: ["x", "y"] });
    const { table } = pivot_wider_spec(long, spec);

    expect(table.shape).toEqual([0, 3]);
    expect(table.types()).toEqual(["integer", "real", "real"]);
  });

  test("pivot_wider on zero rows keeps only the id columns", () => {
    const long = Table.from_columns(["id", "k", "v"], [integer([]), text([]), integer([])]);
    const { table, warnings } = pivot_wider(long, { names_from: "k", values_from: "v" });

    expect(table.columns).toEqual(["id"]);
    expect(table.shape).toEqual([0, 1]);
    expect(warnings).toEqual([]);
  });

  test("ordered factors pass through unchanged", () => {
    const long = new Table({
      id: [1, 2],
      k: ["x", "x"],
      v: factor(["lo", "hi"], { levels: ["lo", "hi"], ordered: true }),
    });
    const x = pivot_wider(long, { names_from: "k", values_from: "v" }).table.column("x");

    expect(x).toEqual({ type: "factor", values: ["lo", "hi"], levels: ["lo", "hi"], ordered: true });
  });

  test("spec columns missing from the data are reported", () => {
    const long = new Table({ id: [1], k: ["x"], v: [5] });
    expect(() => pivot_wider_spec(long, specOf(["x"], ["w"], { k: ["x"] }))).toThrow(
      "Column `w` doesn't exist."
    );
  });

  test("check_spec reasons", () => {
    const reason = (spec: unknown): string | undefined => {
      try {
        check_spec(spec);
        return undefined;
      } catch (error) {
        return error instanceof SpecError ? error.reason : "other";
      }
    };

    expect(reason({})).toBe("not_table");
    expect(reason(new Table({ ".name": ["x"] }))).toBe("missing_columns");
    expect(reason(new Table({ ".name": [1], ".value": ["v"] }))).toBe("name_not_text");
    expect(reason(new Table({ ".name": ["x", "x"], ".value": ["v", "v"] }))).toBe("name_not_unique");
    expect(reason(new Table({ ".name": ["x", null], ".value": ["v", "v"] }))).toBe("name_not_unique");
    expect(reason(new Table({ ".name": ["x"], ".value": [1] }))).toBe("value_not_text");
    expect(reason(specOf(["x"], ["v"], {}))).toBeUndefined();
  });

  test("check_spec moves .name and .value first", () => {
    const spec = new Table({ k: ["x"], ".value": ["v"], ".name": ["x"] });
    expect(check_spec(spec).columns).toEqual([".name", ".value", "k"]);
  });
});
