/**
 * Public-suffix label tree, keyed from the top-level label inward.
 * A boolean entry ends a rule; `true` marks an exception rule ("!label").
 * "*" is an ordinary key standing for any otherwise-unmatched label.
 */
export interface SuffixTreeNode {
  readonly [label: string]: SuffixTreeEntry;
}

export type SuffixTreeEntry = SuffixTreeNode | boolean;

export const WILDCARD_LABEL = "*";

const EMPTY_NODE: SuffixTreeNode = Object.freeze({});

function entryFor(
  node: SuffixTreeNode,
  label: string
): SuffixTreeEntry | undefined {
  return Object.prototype.hasOwnProperty.call(node, label)
    ? node[label]
    : undefined;
}

/**
 * Split a host name into its registrable domain: the longest matching public
 * suffix plus one label, with exception rules giving back one level.
 *
 * "a.b.example.com" -> "example.com" when "com" is a rule.
 */
export function registrableDomain(
  hostname: string,
  root: SuffixTreeNode
): string {
  const labels = hostname.toLowerCase().replace(/\.$/, "").split(".").reverse();
  const matched: string[] = [];
  let inSuffix = true;
  let node = root;

  for (const label of labels) {
    if (inSuffix) {
      matched.push(label);
    }

    const entry = entryFor(node, label);
    if (typeof entry === "object") {
      node = entry;
      continue;
    }
    if (typeof entry === "boolean") {
      inSuffix = !entry;
      node = EMPTY_NODE;
      continue;
    }

    // A wildcard that carries its own subtree is a plain (non-exception) rule
    const wildcard = entryFor(node, WILDCARD_LABEL);
    if (wildcard !== undefined) {
      inSuffix = !(wildcard === true);
      node = EMPTY_NODE;
      continue;
    }

    break;
  }

  return matched.reverse().join(".");
}
