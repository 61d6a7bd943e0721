import fs from "fs";
import path from "path";
import { domainToASCII } from "url";
import { DataSourceError } from "../models/errors";
import { SuffixTreeEntry, SuffixTreeNode } from "./suffix-tree";

interface MutableNode {
  [label: string]: MutableNode | boolean;
}

/**
 * Convert a rule label to the ASCII form PTR names use
 */
function toAsciiLabel(label: string): string {
  if (/^[\x00-\x7f]*$/.test(label)) return label.toLowerCase();
  return domainToASCII(label) || label.toLowerCase();
}

function addRule(root: MutableNode, rule: string): void {
  const isException = rule.startsWith("!");
  const labels = (isException ? rule.slice(1) : rule)
    .split(".")
    .filter((label) => label.length > 0)
    .map(toAsciiLabel)
    .reverse();
  if (labels.length === 0) return;

  let node = root;
  for (const label of labels.slice(0, -1)) {
    const child = node[label];
    if (typeof child === "object") {
      node = child;
    } else {
      // A shorter rule ending here becomes an interior node
      const created: MutableNode = {};
      node[label] = created;
      node = created;
    }
  }

  const last = labels[labels.length - 1];
  if (typeof node[last] !== "object") {
    node[last] = isException;
  }
}

/**
 * Build a suffix tree from public suffix list text
 * (one rule per line, "//" comments, "*." wildcards, "!" exceptions)
 */
export function parseSuffixList(text: string): SuffixTreeNode {
  const root: MutableNode = {};

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("//")) continue;

    addRule(root, line.split(/\s+/)[0]);
  }

  return deepFreeze(root);
}

export function isSuffixTreeNode(value: unknown): value is SuffixTreeNode {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (entry: unknown) => typeof entry === "boolean" || isSuffixTreeNode(entry)
  );
}

function deepFreeze(node: SuffixTreeNode): SuffixTreeNode {
  for (const entry of Object.values(node)) {
    if (typeof entry === "object") deepFreeze(entry);
  }
  return Object.freeze(node);
}

/**
 * Load the suffix tree from a public suffix list file, or from a JSON dump of
 * the tree when the file ends in ".json"
 */
export function loadSuffixTree(filePath: string): SuffixTreeNode {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new DataSourceError(
      `Unable to read public suffix data from ${filePath}`,
      error
    );
  }

  let tree: SuffixTreeNode;
  if (path.extname(filePath).toLowerCase() === ".json") {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new DataSourceError(
        `Public suffix data in ${filePath} is not valid JSON`,
        error
      );
    }
    if (!isSuffixTreeNode(parsed)) {
      throw new DataSourceError(
        `Public suffix data in ${filePath} is not a label tree`
      );
    }
    tree = deepFreeze(parsed);
  } else {
    tree = parseSuffixList(text);
  }

  if (Object.keys(tree).length === 0) {
    throw new DataSourceError(`Public suffix data in ${filePath} has no rules`);
  }

  const ruleCount = countRules(tree);
  console.log(`Loaded ${ruleCount} public suffix rules from ${filePath}`);
  return tree;
}

function countRules(entry: SuffixTreeEntry): number {
  if (typeof entry === "boolean") return 1;
  return Object.values(entry).reduce<number>(
    (total, child) => total + countRules(child),
    0
  );
}
