/**
 * Link graph construction
 *
 * Builds the reciprocal link graph for a vault in one pass over the titles:
 * - Connectivity floor: each topic note links to its next neighbour(s)
 * - Hubs: extra notes that fan out to a share of the topic notes
 * - Density edges: every unlinked topic pair is linked with a probability
 *   derived from the connection density, subject to a degree cap
 *
 * Every insertion goes through addLink(), which records both directions.
 * The graph is frozen before it is returned and never mutated afterwards.
 */

import {
  DuplicateTitleError,
  EmptyTopicSetError,
  InvalidDensityError,
} from '../shared/errors.js';
import { DEFAULT_SEED, mulberry32 } from '../shared/random.js';
import { serverLog } from '../shared/serverLog.js';
import type { LinkGraph } from '../shared/types.js';
import { RESERVED_TITLES, uniquifyTitles } from './topics.js';

// ---------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------

/**
 * Tuning formulas for graph shape. `n` is the number of topic notes
 * (hubs excluded). Every field can be overridden per build.
 */
export interface GraphPolicy {
  /** Number of hub notes to add */
  hubCount: (n: number) => number;
  /** How many topic notes each hub links to */
  hubFanOut: (n: number, density: number) => number;
  /** Maximum links on a topic note */
  degreeCap: (n: number, density: number) => number;
  /** Probability of linking an unlinked topic pair */
  edgeProbability: (density: number) => number;
  /** Following neighbours each topic note links to in the floor pass */
  floorNeighbors: number;
}

export const DEFAULT_GRAPH_POLICY: GraphPolicy = {
  hubCount: (n) => Math.max(1, Math.floor(n / 10)),
  hubFanOut: (n, density) => Math.min(n, Math.max(1, Math.round(density * n))),
  degreeCap: (n, density) => Math.max(5, Math.round((density * n) / 2)),
  edgeProbability: (density) => density,
  floorNeighbors: 1,
};

export interface BuildGraphOptions {
  /** Connection density in [0, 1] */
  density: number;
  seed?: number;
  /** Explicit hub titles; when set, their count replaces policy.hubCount */
  hubTitles?: readonly string[];
  policy?: Partial<GraphPolicy>;
}

/** Policy values after clamping, as applied to one build */
export interface ResolvedPolicy {
  hubCount: number;
  hubFanOut: number;
  degreeCap: number;
  edgeProbability: number;
  floorNeighbors: number;
}

function toCount(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.min(max, Math.max(min, Math.floor(value)));
}

/**
 * Evaluate the policy for a topic count and density.
 * The cap never drops below what the floor pass needs.
 */
export function resolvePolicy(
  n: number,
  density: number,
  overrides: Partial<GraphPolicy> = {}
): ResolvedPolicy {
  const policy: GraphPolicy = { ...DEFAULT_GRAPH_POLICY, ...overrides };

  const floorNeighbors = toCount(policy.floorNeighbors, 1, Math.max(1, n - 1));
  const probability = policy.edgeProbability(density);

  return {
    hubCount: toCount(policy.hubCount(n), 0, n),
    hubFanOut: toCount(policy.hubFanOut(n, density), 1, n),
    degreeCap: Math.max(2 * floorNeighbors, toCount(policy.degreeCap(n, density), 1, Number.MAX_SAFE_INTEGER)),
    edgeProbability: Number.isFinite(probability) ? Math.min(1, Math.max(0, probability)) : 0,
    floorNeighbors,
  };
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export function assertValidDensity(density: number): void {
  if (typeof density !== 'number' || !Number.isFinite(density) || density < 0 || density > 1) {
    throw new InvalidDensityError(density);
  }
}

/** Reject duplicates and reserved names, case-insensitively: titles are filenames too */
function assertUniqueTitles(titles: readonly string[]): void {
  const seen = new Set(RESERVED_TITLES.map(title => title.toLowerCase()));
  for (const title of titles) {
    const key = title.toLowerCase();
    if (seen.has(key)) {
      throw new DuplicateTitleError(title);
    }
    seen.add(key);
  }
}

/**
 * Default hub names, renamed if a topic already uses them.
 */
export function defaultHubTitles(topics: readonly string[], count: number): string[] {
  const candidates = Array.from({ length: count }, (_, i) =>
    count === 1 ? 'Knowledge Hub' : `Knowledge Hub ${i + 1}`
  );
  return uniquifyTitles([...topics, ...candidates]).slice(topics.length);
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Build the link graph for the given topic titles.
 *
 * Same titles, density, seed and policy always produce the same graph.
 *
 * @throws InvalidDensityError if density is outside [0, 1]
 * @throws EmptyTopicSetError if fewer than 2 titles are given
 * @throws DuplicateTitleError if two titles (or a hub and a title) collide
 */
export function buildLinkGraph(topics: readonly string[], options: BuildGraphOptions): LinkGraph {
  const { density, seed = DEFAULT_SEED } = options;

  assertValidDensity(density);
  if (topics.length < 2) {
    throw new EmptyTopicSetError(topics.length);
  }

  const n = topics.length;
  const resolved = resolvePolicy(n, density, options.policy);
  const hubs = options.hubTitles
    ? [...options.hubTitles]
    : defaultHubTitles(topics, resolved.hubCount);

  const order = [...topics, ...hubs];
  assertUniqueTitles(order);

  const links = new Map<string, Set<string>>();
  for (const title of order) {
    links.set(title, new Set());
  }

  const linkSet = (title: string): Set<string> => {
    const set = links.get(title);
    if (!set) {
      throw new Error(`Unknown title in graph: ${title}`);
    }
    return set;
  };
  const degree = (title: string): number => linkSet(title).size;
  const addLink = (a: string, b: string): void => {
    if (a === b) return;
    linkSet(a).add(b);
    linkSet(b).add(a);
  };

  const cap = resolved.degreeCap;

  // 1. Connectivity floor: chain topic notes in generation order
  for (let i = 0; i < n; i++) {
    for (let k = 1; k <= resolved.floorNeighbors && i + k < n; k++) {
      addLink(topics[i], topics[i + k]);
    }
  }

  // 2. Hubs: each starts at its own offset and walks the topics cyclically
  const stride = hubs.length > 0 ? Math.ceil(n / hubs.length) : n;
  hubs.forEach((hub, h) => {
    const start = (h * stride) % n;
    let added = 0;
    for (let step = 0; step < n && added < resolved.hubFanOut; step++) {
      const topic = topics[(start + step) % n];
      if (degree(topic) >= cap) continue;
      addLink(hub, topic);
      added++;
    }
    // Every topic is at the cap; keep the hub attached through the first hub
    if (added === 0 && h > 0) {
      addLink(hub, hubs[0]);
    }
  });

  // 3. Density edges, one draw per unlinked pair in generation order
  const rng = mulberry32(seed);
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const a = topics[i];
      const b = topics[j];
      if (linkSet(a).has(b)) continue;

      const draw = rng();
      if (draw >= resolved.edgeProbability) continue;
      if (degree(a) >= cap || degree(b) >= cap) continue;

      addLink(a, b);
    }
  }

  const graph = freezeGraph(order, hubs, links, cap);
  const stats = graphStats(graph);
  serverLog(
    'graph',
    `Built graph: ${stats.notes} notes, ${stats.hubs} hubs, ${stats.edges} edges (density ${density}, seed ${seed}, cap ${cap})`
  );
  return graph;
}

/**
 * Copy the working sets into read-only structures whose iteration order
 * follows generation order.
 */
function freezeGraph(
  order: readonly string[],
  hubs: readonly string[],
  links: Map<string, Set<string>>,
  degreeCap: number
): LinkGraph {
  const frozen = new Map<string, ReadonlySet<string>>();
  for (const title of order) {
    const own = links.get(title) ?? new Set<string>();
    frozen.set(title, new Set(order.filter(other => own.has(other))));
  }

  return Object.freeze({
    titles: Object.freeze([...order]),
    hubs: new Set(hubs),
    links: frozen,
    degreeCap,
  });
}

// ---------------------------------------------------------------------------
// Read helpers
// ---------------------------------------------------------------------------

/**
 * Links of a note in generation order. Empty for unknown titles.
 */
export function linksOf(graph: LinkGraph, title: string): string[] {
  return [...(graph.links.get(title) ?? [])];
}

export function isHub(graph: LinkGraph, title: string): boolean {
  return graph.hubs.has(title);
}

export interface GraphStats {
  notes: number;
  hubs: number;
  edges: number;
  /** Degree range over topic notes */
  minDegree: number;
  maxDegree: number;
}

export function graphStats(graph: LinkGraph): GraphStats {
  let endpoints = 0;
  let minDegree = Number.POSITIVE_INFINITY;
  let maxDegree = 0;

  for (const title of graph.titles) {
    const size = graph.links.get(title)?.size ?? 0;
    endpoints += size;
    if (graph.hubs.has(title)) continue;
    minDegree = Math.min(minDegree, size);
    maxDegree = Math.max(maxDegree, size);
  }

  return {
    notes: graph.titles.length,
    hubs: graph.hubs.size,
    edges: endpoints / 2,
    minDegree: Number.isFinite(minDegree) ? minDegree : 0,
    maxDegree,
  };
}

export type GraphViolationKind = 'self-link' | 'dangling' | 'asymmetric' | 'orphan' | 'over-cap';

export interface GraphViolation {
  kind: GraphViolationKind;
  title: string;
  other?: string;
}

/**
 * List every broken invariant: reciprocity, self-links, dangling targets,
 * orphans, and topic notes above the degree cap.
 */
export function checkLinkGraph(graph: LinkGraph): GraphViolation[] {
  const violations: GraphViolation[] = [];
  const known = new Set(graph.titles);

  for (const title of graph.titles) {
    const own = graph.links.get(title) ?? new Set<string>();

    if (own.size === 0) {
      violations.push({ kind: 'orphan', title });
    }
    if (!graph.hubs.has(title) && own.size > graph.degreeCap) {
      violations.push({ kind: 'over-cap', title });
    }

    for (const other of own) {
      if (other === title) {
        violations.push({ kind: 'self-link', title });
      } else if (!known.has(other)) {
        violations.push({ kind: 'dangling', title, other });
      } else if (!graph.links.get(other)?.has(title)) {
        violations.push({ kind: 'asymmetric', title, other });
      }
    }
  }

  return violations;
}
