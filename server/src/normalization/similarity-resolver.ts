/**
 * Entity resolution for organization names
 *
 * Raw names are grouped by comparison key, compared only within blocks that
 * share their first significant token, and merged when the pair scores at or
 * above the threshold and no distinct-entity rule objects. Merges are
 * pairwise-driven through union-find; the canonical name of a group is its
 * most frequent display variant.
 */

import { createLogger } from '../logger.js';
import type { RawNameCount } from '../types.js';
import { cleanName } from './name-cleaner.js';
import { combinedSimilarity } from './similarity.js';
import { findDistinctRule, significantTokens, type DistinctEntityRule } from './conflict-rules.js';

const logger = createLogger('similarity-resolver');

export const DEFAULT_SIMILARITY_THRESHOLD = 88;

export interface ResolverOptions {
  threshold?: number;
  rules?: DistinctEntityRule[];
}

export interface CanonicalGroup {
  canonical_name: string;
  occurrence_count: number;
  /** Raw strings (as received) that map to canonical_name */
  variants: string[];
}

export interface ResolutionResult {
  mapping: Map<string, string>;
  groups: CanonicalGroup[];
}

interface KeyNode {
  key: string;
  firstSeen: number;
  count: number;
  rawNames: string[];
  displays: Map<string, { count: number; firstSeen: number }>;
}

/**
 * Count raw values, keeping first-seen order. Null and undefined cells are skipped.
 */
export function countRawNames(values: Iterable<string | null | undefined>): RawNameCount[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    if (typeof value !== 'string') continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts].map(([name, count]) => ({ name, count }));
}

class UnionFind {
  private parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, index) => index);
  }

  find(index: number): number {
    let root = index;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    let current = index;
    while (this.parent[current] !== root) {
      const next = this.parent[current];
      this.parent[current] = root;
      current = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;
    // Lower index stays root so group order follows first sighting
    if (rootA < rootB) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootA] = rootB;
    }
  }
}

export class SimilarityResolver {
  private readonly threshold: number;
  private readonly rules: DistinctEntityRule[];

  constructor(options: ResolverOptions = {}) {
    this.threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    this.rules = options.rules ?? [];
  }

  /** Blocking key: first significant token, or the whole key when it has none */
  static blockingKey(key: string): string {
    return significantTokens(key)[0] ?? key;
  }

  similarity(keyA: string, keyB: string): number {
    return combinedSimilarity(keyA, keyB);
  }

  isSameOrganization(keyA: string, keyB: string): boolean {
    if (keyA === keyB) return true;
    if (this.similarity(keyA, keyB) < this.threshold) return false;
    return findDistinctRule(this.rules, keyA, keyB) === undefined;
  }

  resolve(input: Iterable<RawNameCount | string>): ResolutionResult {
    const mapping = new Map<string, string>();
    const nodes: KeyNode[] = [];
    const nodeByKey = new Map<string, KeyNode>();
    let order = 0;

    for (const item of input) {
      const { name, count } = typeof item === 'string' ? { name: item, count: 1 } : item;
      const position = order++;
      const { display, key } = cleanName(name);

      if (!key) {
        mapping.set(name, display);
        continue;
      }

      let node = nodeByKey.get(key);
      if (!node) {
        node = { key, firstSeen: position, count: 0, rawNames: [], displays: new Map() };
        nodeByKey.set(key, node);
        nodes.push(node);
      }
      node.count += count;
      if (!node.rawNames.includes(name)) {
        node.rawNames.push(name);
      }
      const variant = node.displays.get(display);
      if (variant) {
        variant.count += count;
      } else {
        node.displays.set(display, { count, firstSeen: position });
      }
    }

    const unionFind = new UnionFind(nodes.length);
    const blocks = new Map<string, number[]>();
    nodes.forEach((node, index) => {
      const block = SimilarityResolver.blockingKey(node.key);
      const members = blocks.get(block);
      if (members) {
        members.push(index);
      } else {
        blocks.set(block, [index]);
      }
    });

    let comparisons = 0;
    for (const members of blocks.values()) {
      for (let i = 0; i < members.length; i++) {
        for (let j = i + 1; j < members.length; j++) {
          comparisons++;
          if (this.isSameOrganization(nodes[members[i]].key, nodes[members[j]].key)) {
            unionFind.union(members[i], members[j]);
          }
        }
      }
    }

    const grouped = new Map<number, KeyNode[]>();
    nodes.forEach((node, index) => {
      const root = unionFind.find(index);
      const members = grouped.get(root);
      if (members) {
        members.push(node);
      } else {
        grouped.set(root, [node]);
      }
    });

    const groups: CanonicalGroup[] = [];
    for (const members of [...grouped.values()].sort((a, b) => a[0].firstSeen - b[0].firstSeen)) {
      const canonical = pickCanonical(members);
      const variants = members.flatMap((node) => node.rawNames);
      for (const raw of variants) {
        mapping.set(raw, canonical);
      }
      groups.push({
        canonical_name: canonical,
        occurrence_count: members.reduce((sum, node) => sum + node.count, 0),
        variants,
      });
    }

    logger.info(
      { rawNames: order, keys: nodes.length, blocks: blocks.size, comparisons, organizations: groups.length },
      'Resolved organization names'
    );

    return { mapping, groups };
  }
}

/**
 * Most frequent display variant across the group; ties go to the earliest seen
 */
function pickCanonical(members: KeyNode[]): string {
  let best: { display: string; count: number; firstSeen: number } | null = null;
  for (const node of members) {
    for (const [display, { count, firstSeen }] of node.displays) {
      if (!best || count > best.count || (count === best.count && firstSeen < best.firstSeen)) {
        best = { display, count, firstSeen };
      }
    }
  }
  return best ? best.display : members[0].key;
}
