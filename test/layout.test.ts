// test/layout.test.ts

import { describe, it, expect } from "vitest";
import {
  Adjacency,
  DEFAULT_LAYOUT_CONFIG,
  forceDirectedLayout,
  layoutWithIslands,
  seededRandom,
} from "../src";

function ring(ids: number[]): Adjacency {
  const adjacency: Adjacency = new Map();
  ids.forEach((id, i) => {
    const next = ids[(i + 1) % ids.length];
    const prev = ids[(i - 1 + ids.length) % ids.length];
    adjacency.set(id, [next, prev]);
  });
  return adjacency;
}

describe("forceDirectedLayout", () => {
  it("should keep every node 10px inside its box", () => {
    const cluster = Array.from({ length: 12 }, (_, i) => i);
    const positions = forceDirectedLayout(cluster, ring(cluster), 200, 100, seededRandom(1));

    expect(positions.size).toBe(12);
    for (const pos of positions.values()) {
      expect(pos.x).toBeGreaterThanOrEqual(10);
      expect(pos.x).toBeLessThanOrEqual(190);
      expect(pos.y).toBeGreaterThanOrEqual(10);
      expect(pos.y).toBeLessThanOrEqual(90);
    }
  });

  it("should be reproducible for the same seed", () => {
    const cluster = [0, 1, 2, 3, 4];
    const a = forceDirectedLayout(cluster, ring(cluster), 400, 400, seededRandom(3));
    const b = forceDirectedLayout(cluster, ring(cluster), 400, 400, seededRandom(3));
    expect(Array.from(a.entries())).toEqual(Array.from(b.entries()));
  });

  it("should pull connected nodes closer than unconnected ones", () => {
    // 0-1 connected, 2 alone in the same cluster box
    const adjacency: Adjacency = new Map([
      [0, [1]],
      [1, [0]],
      [2, []],
    ]);
    const positions = forceDirectedLayout([0, 1, 2], adjacency, 1000, 1000, seededRandom(11));
    const dist = (a: number, b: number): number => {
      const pa = positions.get(a) ?? { x: 0, y: 0 };
      const pb = positions.get(b) ?? { x: 0, y: 0 };
      return Math.hypot(pa.x - pb.x, pa.y - pb.y);
    };

    expect(dist(0, 1)).toBeLessThan(dist(0, 2));
    expect(dist(0, 1)).toBeLessThan(dist(1, 2));
  });
});

describe("layoutWithIslands", () => {
  it("should return nothing for an empty graph", () => {
    expect(layoutWithIslands(new Map(), [], -1, seededRandom(1)).size).toBe(0);
  });

  it("should place the largest component on the right and singletons in grid cells", () => {
    const adjacency: Adjacency = new Map([
      [0, [1, 2]],
      [1, [0, 2]],
      [2, [0, 1]],
      [3, []],
      [4, []],
    ]);
    const positions = layoutWithIslands(adjacency, [[0, 1, 2], [3], [4]], 0, seededRandom(5));

    for (const id of [0, 1, 2]) {
      const pos = positions.get(id);
      expect(pos?.x).toBeGreaterThanOrEqual(490);
      expect(pos?.x).toBeLessThanOrEqual(1190);
    }
    // cells are 107px wide; each singleton sits in the middle of a 57x750 area
    expect(positions.get(3)).toEqual({ x: 53, y: 400 });
    expect(positions.get(4)).toEqual({ x: 160, y: 400 });
  });

  it("should honour a non-first largest index", () => {
    const adjacency: Adjacency = new Map([
      [0, []],
      [1, [2]],
      [2, [1]],
    ]);
    const positions = layoutWithIslands(adjacency, [[0], [1, 2]], 1, seededRandom(2));

    expect(positions.get(0)).toEqual({ x: 53, y: 400 });
    expect(positions.get(1)?.x).toBeGreaterThanOrEqual(490);
  });

  it("should keep grid cells on the canvas when the canvas is narrow", () => {
    const adjacency: Adjacency = new Map([
      [0, [1]],
      [1, [0]],
      [2, []],
      [3, []],
    ]);
    const positions = layoutWithIslands(adjacency, [[0, 1], [2], [3]], 0, seededRandom(4), {
      ...DEFAULT_LAYOUT_CONFIG,
      width: 100,
    });

    // cells are clamped to 20px wide
    expect(positions.get(2)).toEqual({ x: 35, y: 400 });
    expect(positions.get(3)).toEqual({ x: 55, y: 400 });
  });

  it("should position every node even when the grid gets dense", () => {
    const singletons = Array.from({ length: 150 }, (_, i) => [i + 3]);
    const clusters = [[0, 1, 2], ...singletons];
    const adjacency: Adjacency = new Map(clusters.flat().map((id) => [id, []]));

    const positions = layoutWithIslands(adjacency, clusters, 0, seededRandom(9), {
      ...DEFAULT_LAYOUT_CONFIG,
      iterations: 10,
    });

    expect(positions.size).toBe(153);
    for (const pos of positions.values()) {
      expect(Number.isFinite(pos.x)).toBe(true);
      expect(Number.isFinite(pos.y)).toBe(true);
    }
  });
});
