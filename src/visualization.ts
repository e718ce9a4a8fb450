// src/visualization.ts

import { mkdir, writeFile } from "fs/promises";
import * as path from "path";
import { DEFAULT_LAYOUT_CONFIG, LayoutConfig } from "./config";
import { ConnectivityAnalyzer, EdgeInfo, TopologySnapshot } from "./connectivity";
import { Position, layoutWithIslands } from "./layout";
import { Random } from "./random";
import { MessageTrace } from "./trace";

export const VISUALIZATION_FILENAME = "network_visualization.json";

export interface NodeInfo {
  id: number;
  addr: string;
  x: number;
  y: number;
  clusterId: number;
}

/**
 * A connected component of the symmetrized peer graph.
 */
export interface ClusterInfo {
  id: number;
  nodeIds: number[];
  size: number;
  centerX: number;
  centerY: number;
  /** True for every component except the largest. */
  isIsolated: boolean;
}

export interface NetworkTopology {
  nodes: NodeInfo[];
  edges: EdgeInfo[];
  clusters: ClusterInfo[];
}

/**
 * The export document read by visualization front-ends.
 */
export interface VisualizationData {
  topology: NetworkTopology;
  traces: MessageTrace[];
  /** ISO 8601 */
  startTime: string;
}

function clusterInfo(
  clusters: number[][],
  largestIndex: number,
  positions: Map<number, Position>,
): ClusterInfo[] {
  return clusters.map((nodeIds, i) => {
    let totalX = 0;
    let totalY = 0;
    for (const id of nodeIds) {
      const pos = positions.get(id);
      totalX += pos?.x ?? 0;
      totalY += pos?.y ?? 0;
    }
    return {
      id: i,
      nodeIds: [...nodeIds],
      size: nodeIds.length,
      centerX: Math.trunc(totalX / nodeIds.length),
      centerY: Math.trunc(totalY / nodeIds.length),
      isIsolated: i !== largestIndex,
    };
  });
}

/**
 * Computes clusters and layout for a frozen peer graph.
 */
export function buildTopology(
  snapshot: TopologySnapshot,
  random: Random,
  layout: LayoutConfig = DEFAULT_LAYOUT_CONFIG,
): NetworkTopology {
  const analyzer = new ConnectivityAnalyzer(snapshot);
  const clusters = analyzer.findConnectedComponents();
  const largest = analyzer.largestComponentIndex();
  const positions = layoutWithIslands(
    analyzer.symmetrizedAdjacency(),
    clusters,
    largest,
    random,
    layout,
  );

  const clusterOf = new Map<number, number>();
  clusters.forEach((members, clusterId) => {
    for (const id of members) {
      clusterOf.set(id, clusterId);
    }
  });

  const nodes: NodeInfo[] = snapshot.nodes.map((node) => {
    const pos = positions.get(node.id) ?? { x: 0, y: 0 };
    return {
      id: node.id,
      addr: node.addr,
      x: Math.trunc(pos.x),
      y: Math.trunc(pos.y),
      clusterId: clusterOf.get(node.id) ?? -1,
    };
  });

  return {
    nodes,
    edges: analyzer.generateTopology(),
    clusters: clusterInfo(clusters, largest, positions),
  };
}

export function buildVisualizationData(
  snapshot: TopologySnapshot,
  traces: MessageTrace[],
  startTime: Date,
  random: Random,
  layout: LayoutConfig = DEFAULT_LAYOUT_CONFIG,
): VisualizationData {
  return {
    topology: buildTopology(snapshot, random, layout),
    traces,
    startTime: startTime.toISOString(),
  };
}

/**
 * Writes `data` as indented JSON to `<outputDir>/network_visualization.json`,
 * creating the directory if needed.
 * @returns The path written.
 */
export async function writeVisualizationData(
  data: VisualizationData,
  outputDir: string,
): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const filename = path.join(outputDir, VISUALIZATION_FILENAME);
  await writeFile(filename, JSON.stringify(data, null, 2), "utf8");
  return filename;
}
