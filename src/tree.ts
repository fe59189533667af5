import { formatCategory, type Category } from "./category";
import type { Terminal } from "./terminals";

export type ParseTree = {
  label: Category;
  children: Array<ParseTree | Terminal>;
};

export function isLeaf(child: ParseTree | Terminal): child is Terminal {
  return "symbol" in child;
}

export function treeLeaves(tree: ParseTree): string[] {
  const out: string[] = [];
  for (const child of tree.children) {
    if (isLeaf(child)) out.push(child.symbol);
    else out.push(...treeLeaves(child));
  }
  return out;
}

export function treeDepth(tree: ParseTree): number {
  let depth = 1;
  for (const child of tree.children) {
    if (isLeaf(child)) continue;
    depth = Math.max(depth, 1 + treeDepth(child));
  }
  return depth;
}

export function treeToBracket(tree: ParseTree): string {
  const children = tree.children
    .map((child) => (isLeaf(child) ? child.symbol : treeToBracket(child)))
    .join(" ");
  return `(${formatCategory(tree.label)}${children ? ` ${children}` : ""})`;
}

export function mapTreeLabels(tree: ParseTree, fn: (label: Category) => Category): ParseTree {
  return {
    label: fn(tree.label),
    children: tree.children.map((child) => (isLeaf(child) ? child : mapTreeLabels(child, fn))),
  };
}
