// src/layout.ts

import { DEFAULT_LAYOUT_CONFIG, LayoutConfig } from "./config";
import { Adjacency } from "./connectivity";
import { Random } from "./random";

export interface Position {
  x: number;
  y: number;
}

const REPULSION = 500;
const ATTRACTION = 0.1;
const DAMPING = 0.9;
const STEP = 0.01;
const MARGIN = 10;

/** Share of the canvas width given to the largest component. */
const MAIN_SHARE = 0.6;
const ISOLATED_GUTTER = 50;
const CELL_PADDING = 25;
/** Smallest cell edge; keeps dense grids from collapsing to nothing. */
const MIN_CELL = 2 * MARGIN;

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Force-directed placement of one cluster inside a `width` x `height` box
 * anchored at the origin.
 *
 * Each step applies repulsion `500 / d^2` between every pair, attraction
 * `0.1 * d` along edges whose both ends are in the cluster, then
 * `v = 0.9 v + 0.01 F` and clamps positions 10px inside the box.
 */
export function forceDirectedLayout(
  cluster: number[],
  adjacency: Adjacency,
  width: number,
  height: number,
  random: Random,
  iterations: number = DEFAULT_LAYOUT_CONFIG.iterations,
): Map<number, Position> {
  const positions = new Map<number, Position>();
  const velocities = new Map<number, Position>();
  const members = new Set(cluster);

  for (const id of cluster) {
    positions.set(id, { x: random() * width, y: random() * height });
    velocities.set(id, { x: 0, y: 0 });
  }

  const at = (map: Map<number, Position>, id: number): Position =>
    map.get(id) ?? { x: 0, y: 0 };

  for (let iter = 0; iter < iterations; iter++) {
    const forces = new Map<number, Position>(cluster.map((id) => [id, { x: 0, y: 0 }]));

    for (let i = 0; i < cluster.length; i++) {
      for (let j = i + 1; j < cluster.length; j++) {
        const a = at(positions, cluster[i]);
        const b = at(positions, cluster[j]);
        const dx = a.x - b.x;
        const dy = a.y - b.y;
        const dist = Math.max(Math.sqrt(dx * dx + dy * dy), 1);

        const force = REPULSION / (dist * dist);
        const fx = (dx / dist) * force;
        const fy = (dy / dist) * force;

        const fa = at(forces, cluster[i]);
        const fb = at(forces, cluster[j]);
        forces.set(cluster[i], { x: fa.x + fx, y: fa.y + fy });
        forces.set(cluster[j], { x: fb.x - fx, y: fb.y - fy });
      }
    }

    for (const id of cluster) {
      for (const neighbour of adjacency.get(id) ?? []) {
        if (!members.has(neighbour)) {
          continue;
        }
        const a = at(positions, id);
        const b = at(positions, neighbour);
        const dx = b.x - a.x;
        const dy = b.y - a.y;
        const dist = Math.sqrt(dx * dx + dy * dy);
        if (dist > 0) {
          const force = ATTRACTION * dist;
          const f = at(forces, id);
          forces.set(id, { x: f.x + (dx / dist) * force, y: f.y + (dy / dist) * force });
        }
      }
    }

    for (const id of cluster) {
      const v = at(velocities, id);
      const f = at(forces, id);
      const velocity = { x: v.x * DAMPING + f.x * STEP, y: v.y * DAMPING + f.y * STEP };
      velocities.set(id, velocity);

      const p = at(positions, id);
      positions.set(id, {
        x: clamp(p.x + velocity.x, MARGIN, width - MARGIN),
        y: clamp(p.y + velocity.y, MARGIN, height - MARGIN),
      });
    }
  }

  return positions;
}

/**
 * Lays out the largest component on the right 60% of the canvas and every
 * other component in a grid on the left, so partitions stand out.
 * Singletons sit in the centre of their grid cell.
 */
export function layoutWithIslands(
  adjacency: Adjacency,
  clusters: number[][],
  largestIndex: number,
  random: Random,
  config: LayoutConfig = DEFAULT_LAYOUT_CONFIG,
): Map<number, Position> {
  const positions = new Map<number, Position>();
  if (clusters.length === 0 || largestIndex < 0) {
    return positions;
  }

  const { width, height, iterations, isolatedColumns } = config;

  const mainWidth = Math.floor(width * MAIN_SHARE);
  const mainStartX = width - mainWidth;
  const main = forceDirectedLayout(
    clusters[largestIndex],
    adjacency,
    mainWidth,
    height,
    random,
    iterations,
  );
  for (const [id, pos] of main) {
    positions.set(id, { x: pos.x + mainStartX, y: pos.y });
  }

  const isolated = clusters.filter((_, i) => i !== largestIndex);
  if (isolated.length === 0) {
    return positions;
  }

  const isolatedWidth = width - mainWidth - ISOLATED_GUTTER;
  const rows = Math.ceil(isolated.length / isolatedColumns);
  const cellWidth = Math.max(Math.floor(isolatedWidth / isolatedColumns), MIN_CELL);
  const cellHeight = Math.max(Math.floor(height / rows), MIN_CELL);

  isolated.forEach((cluster, i) => {
    const col = i % isolatedColumns;
    const row = Math.floor(i / isolatedColumns);
    const cellX = col * cellWidth + CELL_PADDING;
    const cellY = row * cellHeight + CELL_PADDING;
    const w = Math.max(cellWidth - 2 * CELL_PADDING, MIN_CELL);
    const h = Math.max(cellHeight - 2 * CELL_PADDING, MIN_CELL);

    if (cluster.length === 1) {
      positions.set(cluster[0], {
        x: cellX + Math.floor(w / 2),
        y: cellY + Math.floor(h / 2),
      });
      return;
    }

    const local = forceDirectedLayout(cluster, adjacency, w, h, random, iterations);
    for (const [id, pos] of local) {
      positions.set(id, { x: pos.x + cellX, y: pos.y + cellY });
    }
  });

  return positions;
}
