/**
 * Tests for link graph construction
 */

import { describe, it, expect } from 'vitest';
import {
  buildLinkGraph,
  checkLinkGraph,
  defaultHubTitles,
  graphStats,
  isHub,
  linksOf,
  resolvePolicy,
} from '../../../src/core/write/graphBuilder.js';
import {
  DuplicateTitleError,
  EmptyTopicSetError,
  InvalidDensityError,
} from '../../../src/core/shared/errors.js';
import type { LinkGraph } from '../../../src/core/shared/types.js';

function titles(n: number): string[] {
  return Array.from({ length: n }, (_, i) => `T${i}`);
}

function degree(graph: LinkGraph, title: string): number {
  return graph.links.get(title)?.size ?? 0;
}

/** Titles reachable from the first title */
function reachable(graph: LinkGraph): Set<string> {
  const seen = new Set<string>([graph.titles[0]]);
  const queue = [graph.titles[0]];
  while (queue.length > 0) {
    const current = queue.shift() ?? '';
    for (const next of linksOf(graph, current)) {
      if (!seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }
  return seen;
}

describe('resolvePolicy', () => {
  it('should apply the default formulas', () => {
    expect(resolvePolicy(30, 0.4)).toEqual({
      hubCount: 3,
      hubFanOut: 12,
      degreeCap: 6,
      edgeProbability: 0.4,
      floorNeighbors: 1,
    });
  });

  it('should keep one hub for small vaults', () => {
    expect(resolvePolicy(5, 0).hubCount).toBe(1);
    expect(resolvePolicy(5, 0).hubFanOut).toBe(1);
  });

  it('should never let the cap drop below what the floor needs', () => {
    const resolved = resolvePolicy(10, 0.5, { floorNeighbors: 4, degreeCap: () => 3 });
    expect(resolved.floorNeighbors).toBe(4);
    expect(resolved.degreeCap).toBe(8);
  });
});

describe('defaultHubTitles', () => {
  it('should number hubs when there are several', () => {
    expect(defaultHubTitles(['A', 'B'], 2)).toEqual(['Knowledge Hub 1', 'Knowledge Hub 2']);
  });

  it('should rename a hub that clashes with a topic', () => {
    expect(defaultHubTitles(['Knowledge Hub', 'X'], 1)).toEqual(['Knowledge Hub (2)']);
  });
});

describe('buildLinkGraph', () => {
  describe('validation', () => {
    it('should reject densities outside [0, 1]', () => {
      expect(() => buildLinkGraph(titles(5), { density: 1.5 })).toThrow(InvalidDensityError);
      expect(() => buildLinkGraph(titles(5), { density: -0.1 })).toThrow(InvalidDensityError);
      expect(() => buildLinkGraph(titles(5), { density: Number.NaN })).toThrow(InvalidDensityError);
    });

    it('should check density before the topic count', () => {
      expect(() => buildLinkGraph(['Only'], { density: 2 })).toThrow(InvalidDensityError);
    });

    it('should reject fewer than two titles', () => {
      expect(() => buildLinkGraph(['Only'], { density: 0.5 })).toThrow(EmptyTopicSetError);
      expect(() => buildLinkGraph([], { density: 0.5 })).toThrow(EmptyTopicSetError);
    });

    it('should reject duplicate titles, case-insensitively', () => {
      expect(() => buildLinkGraph(['Alpha', 'alpha'], { density: 0.5 })).toThrow(DuplicateTitleError);
    });

    it('should reject a hub title that matches a topic', () => {
      expect(() => buildLinkGraph(['Alpha', 'Beta'], { density: 0.5, hubTitles: ['Alpha'] }))
        .toThrow(DuplicateTitleError);
    });

    it('should reject the reserved index name', () => {
      expect(() => buildLinkGraph(['README', 'Beta'], { density: 0.5 })).toThrow(DuplicateTitleError);
    });
  });

  describe('density 0', () => {
    it('should link five titles by the floor chain and one hub edge', () => {
      const graph = buildLinkGraph(titles(5), { density: 0, seed: 1 });

      expect(graph.titles).toEqual(['T0', 'T1', 'T2', 'T3', 'T4', 'Knowledge Hub']);
      expect(linksOf(graph, 'T0')).toEqual(['T1', 'Knowledge Hub']);
      expect(linksOf(graph, 'T2')).toEqual(['T1', 'T3']);
      expect(linksOf(graph, 'T4')).toEqual(['T3']);
      expect(linksOf(graph, 'Knowledge Hub')).toEqual(['T0']);
      expect(graphStats(graph)).toEqual({ notes: 6, hubs: 1, edges: 5, minDegree: 1, maxDegree: 2 });
    });

    it('should keep ten titles connected with only floor edges between topics', () => {
      const graph = buildLinkGraph(titles(10), { density: 0, seed: 7 });
      const topics = titles(10);

      for (const [i, title] of topics.entries()) {
        const topicLinks = linksOf(graph, title).filter(link => !isHub(graph, link));
        const expected = [topics[i - 1], topics[i + 1]].filter((t): t is string => t !== undefined);
        expect(topicLinks).toEqual(expected);
      }
      expect(graphStats(graph).edges).toBe(10);
      expect(reachable(graph).size).toBe(graph.titles.length);
      expect(checkLinkGraph(graph)).toEqual([]);
    });

    it('should spread hubs across the titles', () => {
      const graph = buildLinkGraph(titles(20), { density: 0 });
      expect(linksOf(graph, 'Knowledge Hub 1')).toEqual(['T0']);
      expect(linksOf(graph, 'Knowledge Hub 2')).toEqual(['T10']);
    });

    it('should attach a hub to the first hub when every topic is at the cap', () => {
      const graph = buildLinkGraph(titles(3), {
        density: 0,
        policy: { hubCount: () => 2, hubFanOut: () => 5, degreeCap: () => 1 },
      });

      expect(graph.degreeCap).toBe(2);
      expect(linksOf(graph, 'Knowledge Hub 1')).toEqual(['T0', 'T2', 'Knowledge Hub 2']);
      expect(linksOf(graph, 'Knowledge Hub 2')).toEqual(['Knowledge Hub 1']);
      expect(checkLinkGraph(graph)).toEqual([]);
    });
  });

  describe('density 1', () => {
    it('should link every pair when the cap allows it', () => {
      const graph = buildLinkGraph(titles(5), { density: 1, seed: 3 });

      for (const title of titles(5)) {
        expect(degree(graph, title)).toBe(5);
        expect(linksOf(graph, title)).toContain('Knowledge Hub');
      }
      expect(graphStats(graph).edges).toBe(15);
    });

    it('should link every topic pair of ten titles without hubs or a tight cap', () => {
      const graph = buildLinkGraph(titles(10), {
        density: 1,
        policy: { hubCount: () => 0, degreeCap: () => 100 },
      });

      expect(graph.hubs.size).toBe(0);
      expect(graphStats(graph).edges).toBe(45);
    });

    it('should only leave a pair unlinked when an end is at the cap', () => {
      const graph = buildLinkGraph(titles(10), { density: 1, seed: 11 });
      const topics = titles(10);

      for (let i = 0; i < topics.length; i++) {
        for (let j = i + 1; j < topics.length; j++) {
          if (graph.links.get(topics[i])?.has(topics[j])) continue;
          const saturated = degree(graph, topics[i]) >= graph.degreeCap || degree(graph, topics[j]) >= graph.degreeCap;
          expect(saturated).toBe(true);
        }
      }
      expect(checkLinkGraph(graph)).toEqual([]);
    });
  });

  it('should respect the degree cap on topic notes', () => {
    const graph = buildLinkGraph(titles(40), { density: 0.9, seed: 5 });
    expect(graph.degreeCap).toBe(18);
    expect(graphStats(graph).maxDegree).toBeLessThanOrEqual(18);
  });

  it('should produce the same graph for the same seed', () => {
    const first = buildLinkGraph(titles(30), { density: 0.5, seed: 99 });
    const second = buildLinkGraph(titles(30), { density: 0.5, seed: 99 });
    expect(second.titles).toEqual(first.titles);
    for (const title of first.titles) {
      expect(linksOf(second, title)).toEqual(linksOf(first, title));
    }
  });

  it('should vary with the seed', () => {
    const base = buildLinkGraph(titles(30), { density: 0.5, seed: 1 });
    const others = [2, 3, 4, 5].map(seed => buildLinkGraph(titles(30), { density: 0.5, seed }));
    const differs = others.some(other =>
      base.titles.some(title => linksOf(other, title).join('|') !== linksOf(base, title).join('|'))
    );
    expect(differs).toBe(true);
  });

  it('should add more edges as density grows', () => {
    const totalEdges = (density: number): number =>
      Array.from({ length: 20 }, (_, seed) => graphStats(buildLinkGraph(titles(30), { density, seed })).edges)
        .reduce((sum, edges) => sum + edges, 0);

    const none = totalEdges(0);
    const half = totalEdges(0.5);
    const full = totalEdges(1);
    expect(none).toBeLessThan(half);
    expect(half).toBeLessThan(full);
  });

  it('should return a frozen graph', () => {
    const graph = buildLinkGraph(titles(4), { density: 0.5 });
    expect(Object.isFrozen(graph)).toBe(true);
    expect(Object.isFrozen(graph.titles)).toBe(true);
  });
});

describe('checkLinkGraph', () => {
  it('should report every broken invariant', () => {
    const broken: LinkGraph = {
      titles: ['A', 'B', 'C'],
      hubs: new Set(),
      links: new Map([
        ['A', new Set(['B', 'A'])],
        ['B', new Set<string>()],
        ['C', new Set(['Z'])],
      ]),
      degreeCap: 5,
    };

    expect(checkLinkGraph(broken)).toEqual([
      { kind: 'asymmetric', title: 'A', other: 'B' },
      { kind: 'self-link', title: 'A' },
      { kind: 'orphan', title: 'B' },
      { kind: 'dangling', title: 'C', other: 'Z' },
    ]);
  });

  it('should flag topic notes over the cap but not hubs', () => {
    const graph: LinkGraph = {
      titles: ['A', 'B', 'C', 'H'],
      hubs: new Set(['H']),
      links: new Map([
        ['A', new Set(['B', 'C', 'H'])],
        ['B', new Set(['A', 'H'])],
        ['C', new Set(['A', 'H'])],
        ['H', new Set(['A', 'B', 'C'])],
      ]),
      degreeCap: 2,
    };

    expect(checkLinkGraph(graph)).toEqual([{ kind: 'over-cap', title: 'A' }]);
  });
});
