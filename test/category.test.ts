import { expect, test } from "vitest";
import {
  EMPTY_BINDINGS,
  atom,
  cat,
  categoriesEqual,
  categoryKey,
  formatCategory,
  freshVariable,
  rename,
  resolve,
  struct,
  unifies,
  unify,
  type Category,
} from "../index";

test("atoms unify only when equal", () => {
  expect(unify(atom("sg"), EMPTY_BINDINGS, atom("sg"), EMPTY_BINDINGS).ok).toBe(true);
  expect(unify(atom("sg"), EMPTY_BINDINGS, atom("pl"), EMPTY_BINDINGS)).toEqual({ ok: false });
});

test("variables bind and later unifications see the binding", () => {
  const n = freshVariable("n");
  const np = cat("NP", { num: n });
  const result = unify(np, EMPTY_BINDINGS, cat("NP", { num: "sg" }), EMPTY_BINDINGS);
  expect(result.ok).toBe(true);
  if (!result.ok) return;

  expect(formatCategory(result.category)).toBe("NP[num=sg]");
  expect(formatCategory(resolve(np, result.bindings))).toBe("NP[num=sg]");
  expect(unify(n, result.bindings, atom("pl"), EMPTY_BINDINGS).ok).toBe(false);
  expect(unify(n, result.bindings, atom("sg"), EMPTY_BINDINGS).ok).toBe(true);
});

test("attributes present on one side are copied through", () => {
  const result = unify(cat("N", { num: "sg" }), EMPTY_BINDINGS, cat("N", { gnd: "masc" }), EMPTY_BINDINGS);
  expect(result.ok).toBe(true);
  if (!result.ok) return;
  expect(formatCategory(result.category)).toBe("N[gnd=masc,num=sg]");
});

test("conflicting category names or values fail", () => {
  expect(unifies(cat("N"), cat("V"))).toBe(false);
  expect(unifies(cat("N", { num: "sg" }), cat("N", { num: "pl" }))).toBe(false);
  expect(unifies(cat("NP"), cat("NP", { num: "sg" }))).toBe(true);
  expect(unifies(atom("NP"), cat("NP"))).toBe(false);
});

test("a variable bound to a structure picks up features merged into it", () => {
  const a = freshVariable("a");
  const first = unify(a, EMPTY_BINDINGS, struct({ num: "sg" }), EMPTY_BINDINGS);
  expect(first.ok).toBe(true);
  if (!first.ok) return;

  const second = unify(a, first.bindings, struct({ per: "3" }), EMPTY_BINDINGS);
  expect(second.ok).toBe(true);
  if (!second.ok) return;
  expect(formatCategory(resolve(a, second.bindings))).toBe("[num=sg,per=3]");

  expect(unify(a, second.bindings, struct({ num: "pl" }), EMPTY_BINDINGS).ok).toBe(false);
});

test("variable chains resolve to the final value", () => {
  const x = freshVariable("x");
  const y = freshVariable("y");
  const linked = unify(x, EMPTY_BINDINGS, y, EMPTY_BINDINGS);
  expect(linked.ok).toBe(true);
  if (!linked.ok) return;

  const bound = unify(y, linked.bindings, atom("acc"), EMPTY_BINDINGS);
  expect(bound.ok).toBe(true);
  if (!bound.ok) return;
  expect(resolve(x, bound.bindings)).toEqual(atom("acc"));
});

test("a variable bound to another variable follows later merges into it", () => {
  const a = freshVariable("a");
  const b = freshVariable("b");
  const aBound = new Map<number, Category>([[a.id, struct({ p: "1" })]]);
  const shared = struct({ x: a, y: b, w: b });
  const other = struct({ y: a, w: struct({ q: "2" }) });

  for (const result of [unify(shared, aBound, other, EMPTY_BINDINGS), unify(other, EMPTY_BINDINGS, shared, aBound)]) {
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(formatCategory(resolve(a, result.bindings))).toBe("[p=1,q=2]");
    expect(formatCategory(resolve(b, result.bindings))).toBe("[p=1,q=2]");
    expect(formatCategory(result.category)).toBe("[w=[p=1,q=2],x=[p=1,q=2],y=[p=1,q=2]]");
  }
});

test("two bound variables unified together stay linked", () => {
  const a = freshVariable("a");
  const c = freshVariable("c");
  const first = unify(
    a,
    new Map<number, Category>([[a.id, struct({ p: "1" })]]),
    c,
    new Map<number, Category>([[c.id, struct({ q: "2" })]]),
  );
  expect(first.ok).toBe(true);
  if (!first.ok) return;

  const second = unify(c, first.bindings, struct({ r: "3" }), EMPTY_BINDINGS);
  expect(second.ok).toBe(true);
  if (!second.ok) return;
  expect(formatCategory(resolve(a, second.bindings))).toBe("[p=1,q=2,r=3]");
  expect(formatCategory(resolve(c, second.bindings))).toBe("[p=1,q=2,r=3]");
});

test("occurs check rejects cyclic structures", () => {
  const x = freshVariable("x");
  expect(unify(x, EMPTY_BINDINGS, struct({ self: x }), EMPTY_BINDINGS).ok).toBe(false);
});

test("bindings from both sides are honoured", () => {
  const x = freshVariable("x");
  const y = freshVariable("y");
  const left = new Map<number, Category>([[x.id, atom("sg")]]);
  const right = new Map<number, Category>([[y.id, atom("pl")]]);
  expect(unify(x, left, y, right).ok).toBe(false);
  expect(unify(x, left, y, new Map<number, Category>([[y.id, atom("sg")]])).ok).toBe(true);
});

test("unify leaves its input bindings untouched", () => {
  const n = freshVariable("n");
  const before = new Map<number, Category>();
  const result = unify(n, before, atom("sg"), EMPTY_BINDINGS);
  expect(result.ok).toBe(true);
  expect(before.size).toBe(0);
});

test("rename gives fresh variables but keeps shared ones shared", () => {
  const n = freshVariable("n");
  const original = struct({ left: n, right: n });
  const renamed = rename(original);

  expect(categoriesEqual(original, renamed)).toBe(true);
  expect(renamed).not.toEqual(original);
  if (renamed.kind !== "struct") throw new Error("expected a struct");
  expect(renamed.features.get("left")).toBe(renamed.features.get("right"));
  expect(renamed.features.get("left")).not.toBe(n);
});

test("category keys ignore variable identity but not variable sharing", () => {
  const a = freshVariable("a");
  const b = freshVariable("b");
  const c = freshVariable("c");
  expect(categoryKey([cat("A", { x: a }), cat("B", { y: a })])).toBe(categoryKey([cat("A", { x: b }), cat("B", { y: b })]));
  expect(categoryKey([struct({ p: a, q: b })])).not.toBe(categoryKey([struct({ p: c, q: c })]));
  expect(categoryKey([cat("A"), "a"])).not.toBe(categoryKey([cat("A"), "b"]));
});

test("formatCategory writes grammar-file notation", () => {
  expect(formatCategory(cat("S"))).toBe("S");
  expect(formatCategory(cat("S", { num: freshVariable("n") }))).toBe("S[num=?n]");
  expect(formatCategory(cat("NP", { agr: struct({ per: "3", num: "pl" }) }))).toBe("NP[agr=[num=pl,per=3]]");
  expect(formatCategory(atom("x"))).toBe("x");
});
