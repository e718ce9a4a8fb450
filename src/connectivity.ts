// src/connectivity.ts

/**
 * A directed peer edge: `from` lists `to` as a peer.
 */
export interface EdgeInfo {
  from: number;
  to: number;
}

/**
 * One node of a frozen peer graph.
 */
export interface SnapshotNode {
  id: number;
  /** `host:port` */
  addr: string;
  /** Ids resolved from the node's peer addresses, in peer-list order. */
  peers: number[];
}

export interface TopologySnapshot {
  nodes: SnapshotNode[];
}

export type Adjacency = Map<number, number[]>;

/**
 * Connectivity queries over a frozen peer graph.
 *
 * Peer edges are directed: A may list B without B listing A. Forwarding
 * follows the directed graph (`directedAdjacency`, `reachableFrom`), while
 * clustering treats every edge as bidirectional (`symmetrizedAdjacency`,
 * `findConnectedComponents`). Both views are exposed because they can
 * disagree: a node that only points into a component belongs to it but is
 * never reached by gossip originating there.
 */
export class ConnectivityAnalyzer {
  private readonly nodeIds: number[];
  private readonly known: Set<number>;
  private directed?: Adjacency;
  private symmetric?: Adjacency;
  private components?: number[][];

  constructor(private readonly snapshot: TopologySnapshot) {
    this.nodeIds = snapshot.nodes.map((n) => n.id);
    this.known = new Set(this.nodeIds);
  }

  get nodeCount(): number {
    return this.nodeIds.length;
  }

  /**
   * Directed edges exactly as recorded in each peer list. Peers that do not
   * resolve to a node of the snapshot are skipped.
   */
  generateTopology(): EdgeInfo[] {
    const edges: EdgeInfo[] = [];
    for (const node of this.snapshot.nodes) {
      for (const peer of node.peers) {
        if (this.known.has(peer)) {
          edges.push({ from: node.id, to: peer });
        }
      }
    }
    return edges;
  }

  directedAdjacency(): Adjacency {
    if (!this.directed) {
      const adjacency: Adjacency = new Map(this.nodeIds.map((id) => [id, []]));
      for (const edge of this.generateTopology()) {
        adjacency.get(edge.from)?.push(edge.to);
      }
      this.directed = adjacency;
    }
    return this.directed;
  }

  /**
   * Every directed edge taken in both directions, without duplicates.
   */
  symmetrizedAdjacency(): Adjacency {
    if (!this.symmetric) {
      const sets = new Map<number, Set<number>>(this.nodeIds.map((id) => [id, new Set()]));
      for (const edge of this.generateTopology()) {
        sets.get(edge.from)?.add(edge.to);
        sets.get(edge.to)?.add(edge.from);
      }
      const adjacency: Adjacency = new Map();
      for (const [id, neighbours] of sets) {
        adjacency.set(id, Array.from(neighbours));
      }
      this.symmetric = adjacency;
    }
    return this.symmetric;
  }

  /**
   * Connected components of the symmetrized graph. Nodes are visited in
   * snapshot order with an explicit-stack depth-first search; each component
   * lists its members in visiting order. Every node lands in exactly one
   * component, isolated nodes in a component of their own.
   */
  findConnectedComponents(): number[][] {
    if (this.components) {
      return this.components.map((c) => [...c]);
    }

    const adjacency = this.symmetrizedAdjacency();
    const visited = new Set<number>();
    const components: number[][] = [];

    for (const start of this.nodeIds) {
      if (visited.has(start)) {
        continue;
      }

      const component: number[] = [];
      const stack: Array<{ id: number; next: number }> = [{ id: start, next: 0 }];
      visited.add(start);
      component.push(start);

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const neighbours = adjacency.get(frame.id) ?? [];
        if (frame.next >= neighbours.length) {
          stack.pop();
          continue;
        }
        const neighbour = neighbours[frame.next++];
        if (!visited.has(neighbour)) {
          visited.add(neighbour);
          component.push(neighbour);
          stack.push({ id: neighbour, next: 0 });
        }
      }

      components.push(component);
    }

    this.components = components;
    return components.map((c) => [...c]);
  }

  /**
   * Index of the largest component; the first one wins ties. -1 when the
   * snapshot is empty.
   */
  largestComponentIndex(): number {
    const components = this.findConnectedComponents();
    let largest = -1;
    let largestSize = 0;
    components.forEach((component, i) => {
      if (component.length > largestSize) {
        largestSize = component.length;
        largest = i;
      }
    });
    return largest;
  }

  /** Members of the component containing `id`, or [] for unknown ids. */
  componentOf(id: number): number[] {
    return this.findConnectedComponents().find((c) => c.includes(id)) ?? [];
  }

  /**
   * Nodes reachable from `origin` over at least one directed edge. `origin`
   * itself is included only if some path leads back to it.
   */
  reachableFrom(origin: number): Set<number> {
    const adjacency = this.directedAdjacency();
    const reached = new Set<number>();
    const queue = [...(adjacency.get(origin) ?? [])];

    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || reached.has(id)) {
        continue;
      }
      reached.add(id);
      queue.push(...(adjacency.get(id) ?? []));
    }
    return reached;
  }
}
