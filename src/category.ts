export const CATEGORY_NAME = "*type*";

export type Atom = {
  kind: "atom";
  value: string;
};

export type Variable = {
  kind: "var";
  name: string;
  id: number;
};

export type FeatureStruct = {
  kind: "struct";
  features: ReadonlyMap<string, Category>;
};

export type Category = Atom | Variable | FeatureStruct;

export type Bindings = ReadonlyMap<number, Category>;

export type UnificationFailure = { ok: false };

export type UnificationResult =
  | {
      ok: true;
      category: Category;
      bindings: Bindings;
    }
  | UnificationFailure;

export const EMPTY_BINDINGS: Bindings = new Map<number, Category>();

const FAILURE: UnificationFailure = { ok: false };

let variableCounter = 0;

export function atom(value: string): Atom {
  return { kind: "atom", value };
}

export function freshVariable(name: string): Variable {
  variableCounter += 1;
  return { kind: "var", name, id: variableCounter };
}

export function struct(features: Record<string, Category | string>): FeatureStruct {
  const out = new Map<string, Category>();
  for (const [key, value] of Object.entries(features)) {
    out.set(key, typeof value === "string" ? atom(value) : value);
  }
  return { kind: "struct", features: out };
}

/** `cat("NP", { num: "sg" })` builds the category written `NP[num=sg]` in grammar files. */
export function cat(name: string, features: Record<string, Category | string> = {}): FeatureStruct {
  return struct({ [CATEGORY_NAME]: name, ...features });
}

export function isCategory(value: unknown): value is Category {
  if (typeof value !== "object" || value === null || !("kind" in value)) return false;
  if (value.kind === "atom") return "value" in value && typeof value.value === "string";
  if (value.kind === "var") return "id" in value && typeof value.id === "number";
  if (value.kind !== "struct" || !("features" in value) || !(value.features instanceof Map)) return false;
  for (const [key, child] of value.features) {
    if (typeof key !== "string" || !isCategory(child)) return false;
  }
  return true;
}

export function categoryName(category: Category): string | undefined {
  if (category.kind === "atom") return category.value;
  if (category.kind !== "struct") return undefined;
  const name = category.features.get(CATEGORY_NAME);
  return name?.kind === "atom" ? name.value : undefined;
}

type Dereferenced = {
  value: Category;
  owner?: Variable;
};

function deref(category: Category, env: Bindings): Dereferenced {
  let current = category;
  let owner: Variable | undefined;
  while (current.kind === "var") {
    const bound = env.get(current.id);
    if (bound === undefined) break;
    owner = current;
    current = bound;
  }
  return { value: current, owner };
}

function occurs(id: number, category: Category, env: Bindings): boolean {
  if (category.kind === "atom") return false;
  if (category.kind === "var") {
    if (category.id === id) return true;
    const bound = env.get(category.id);
    return bound !== undefined && occurs(id, bound, env);
  }
  for (const value of category.features.values()) {
    if (occurs(id, value, env)) return true;
  }
  return false;
}

/** Binds `variable` to `target` and returns the variable, so later merges into `target` stay visible through it. */
function bindVariable(variable: Variable, target: Category, env: Map<number, Category>): Category | null {
  if (occurs(variable.id, target, env)) return null;
  env.set(variable.id, target);
  return variable;
}

function unifyInto(a: Category, b: Category, env: Map<number, Category>): Category | null {
  const left = deref(a, env);
  const right = deref(b, env);
  const l = left.value;
  const r = right.value;

  if (l.kind === "var") {
    if (r.kind === "var" && r.id === l.id) return l;
    return bindVariable(l, right.owner ?? r, env);
  }
  if (r.kind === "var") return bindVariable(r, left.owner ?? l, env);
  if (l.kind === "atom") return r.kind === "atom" && r.value === l.value ? l : null;
  if (r.kind !== "struct") return null;

  const merged = new Map(l.features);
  for (const [key, value] of r.features) {
    const existing = merged.get(key);
    if (existing === undefined) {
      merged.set(key, value);
      continue;
    }
    const unified = unifyInto(existing, value, env);
    if (unified === null) return null;
    merged.set(key, unified);
  }

  const result: FeatureStruct = { kind: "struct", features: merged };
  // variables that pointed at either side now share the merged structure
  const first = left.owner ?? right.owner;
  if (first === undefined) return result;
  if (occurs(first.id, result, env)) return null;
  env.set(first.id, result);
  const second = right.owner;
  if (second !== undefined && second.id !== first.id) {
    if (occurs(second.id, first, env)) return null;
    env.set(second.id, first);
  }
  return first;
}

function mergeBindings(left: Bindings, right: Bindings): Map<number, Category> | null {
  const env = new Map(left);
  for (const [id, value] of right) {
    const existing = env.get(id);
    if (existing === undefined) {
      env.set(id, value);
    } else if (existing !== value && unifyInto({ kind: "var", name: "", id }, value, env) === null) {
      return null;
    }
  }
  return env;
}

export function unify(a: Category, bindingsA: Bindings, b: Category, bindingsB: Bindings): UnificationResult {
  const env = mergeBindings(bindingsA, bindingsB);
  if (env === null) return FAILURE;
  const category = unifyInto(a, b, env);
  if (category === null) return FAILURE;
  return { ok: true, category: resolve(category, env), bindings: env };
}

export function unifies(a: Category, b: Category): boolean {
  return unify(a, EMPTY_BINDINGS, b, EMPTY_BINDINGS).ok;
}

export function resolve(category: Category, bindings: Bindings): Category {
  if (bindings.size === 0) return category;
  const { value } = deref(category, bindings);
  if (value.kind !== "struct") return value;
  const features = new Map<string, Category>();
  for (const [key, child] of value.features) {
    features.set(key, resolve(child, bindings));
  }
  return { kind: "struct", features };
}

export function rename(category: Category, mapping: Map<number, Variable> = new Map()): Category {
  if (category.kind === "atom") return category;
  if (category.kind === "var") {
    let renamed = mapping.get(category.id);
    if (!renamed) {
      renamed = freshVariable(category.name);
      mapping.set(category.id, renamed);
    }
    return renamed;
  }
  const features = new Map<string, Category>();
  for (const [key, child] of category.features) {
    features.set(key, rename(child, mapping));
  }
  return { kind: "struct", features };
}

function sortedFeatures(category: FeatureStruct): Array<[string, Category]> {
  return [...category.features.entries()].sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

/**
 * Canonical text for a sequence of categories and terminals. Variables are
 * numbered by first occurrence across the whole sequence, so two sequences get
 * the same key exactly when they are equal up to variable renaming.
 */
export function categoryKey(elements: ReadonlyArray<Category | string>): string {
  const numbering = new Map<number, number>();
  const write = (category: Category): string => {
    if (category.kind === "atom") return JSON.stringify(category.value);
    if (category.kind === "var") {
      let n = numbering.get(category.id);
      if (n === undefined) {
        n = numbering.size;
        numbering.set(category.id, n);
      }
      return `?${n}`;
    }
    return `[${sortedFeatures(category)
      .map(([key, value]) => `${JSON.stringify(key)}=${write(value)}`)
      .join(",")}]`;
  };
  return elements.map((element) => (typeof element === "string" ? `'${JSON.stringify(element)}` : write(element))).join(" ");
}

export function categoriesEqual(a: Category, b: Category): boolean {
  return categoryKey([a]) === categoryKey([b]);
}

export function formatCategory(category: Category): string {
  if (category.kind === "atom") return category.value;
  if (category.kind === "var") return `?${category.name}`;
  const name = categoryName(category);
  const pairs = sortedFeatures(category)
    .filter(([key]) => key !== CATEGORY_NAME || name === undefined)
    .map(([key, value]) => `${key}=${formatCategory(value)}`);
  if (name === undefined) return `[${pairs.join(",")}]`;
  if (pairs.length === 0) return name;
  return `${name}[${pairs.join(",")}]`;
}
