/**
 * Directed graph keyed by string ids. An edge `from -> to` means `to` depends on `from`.
 * Nodes keep their insertion order, which callers rely on for deterministic output.
 */
export class Graph<T> {
  private nodes: Map<string, T> = new Map();
  private adjacencyList: Map<string, Set<string>> = new Map();
  private reverseList: Map<string, Set<string>> = new Map();

  addNode(id: string, data: T): void {
    if (this.nodes.has(id)) throw new Error(`Node ${id} already exists`);
    this.nodes.set(id, data);
    this.adjacencyList.set(id, new Set());
    this.reverseList.set(id, new Set());
  }

  addEdge(from: string, to: string): void {
    const successors = this.adjacencyList.get(from);
    const predecessors = this.reverseList.get(to);
    if (!successors) throw new Error(`Node ${from} does not exist`);
    if (!predecessors) throw new Error(`Node ${to} does not exist`);

    successors.add(to);
    predecessors.add(from);
  }

  getNode(id: string): T | undefined {
    return this.nodes.get(id);
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  get size(): number {
    return this.nodes.size;
  }

  /** Node ids in insertion order */
  nodeIds(): string[] {
    return [...this.nodes.keys()];
  }

  /** Direct dependencies of a node, in the order the edges were added */
  dependenciesOf(id: string): string[] {
    const predecessors = this.reverseList.get(id);
    if (!predecessors) throw new Error(`Node ${id} does not exist`);
    return [...predecessors];
  }

  /** Ids along a path of edges from `from` to `to`, both included, or undefined when none exists */
  findPath(from: string, to: string): string[] | undefined {
    const previous: Map<string, string> = new Map();
    const visited: Set<string> = new Set([from]);
    let frontier: string[] = [from];

    while (frontier.length > 0) {
      const next: string[] = [];

      for (const node of frontier) {
        if (node === to) {
          const path = [node];
          for (let step = previous.get(node); step !== undefined; step = previous.get(step)) path.unshift(step);
          return path;
        }

        for (const neighbor of this.adjacencyList.get(node) ?? []) {
          if (visited.has(neighbor)) continue;
          visited.add(neighbor);
          previous.set(neighbor, node);
          next.push(neighbor);
        }
      }

      frontier = next;
    }

    return undefined;
  }

  /*
   * Returns nodes in topological order, grouped by layers.
   * Format: [['A', 'B'], ['C']] -> A and B have no dependencies, C depends on one of them.
   */
  topologicalSort(): string[][] {
    const inDegree = this.calculateInDegrees();
    const result: string[][] = [];
    let queue: string[] = [];

    for (const [node, degree] of inDegree.entries()) if (degree === 0) queue.push(node);

    while (queue.length > 0) {
      const currentLayer = [...queue];
      result.push(currentLayer);

      const nextQueue: string[] = [];

      for (const node of currentLayer)
        for (const neighbor of this.adjacencyList.get(node) ?? []) {
          const newDegree = (inDegree.get(neighbor) ?? 0) - 1;
          inDegree.set(neighbor, newDegree);
          if (newDegree === 0) nextQueue.push(neighbor);
        }

      queue = nextQueue;
    }

    const totalNodes = result.reduce((acc, layer) => acc + layer.length, 0);
    if (totalNodes !== this.nodes.size) throw new Error('Dependency Cycle Detected');

    return result;
  }

  private calculateInDegrees(): Map<string, number> {
    const inDegree: Map<string, number> = new Map();

    for (const node of this.nodes.keys()) inDegree.set(node, 0);

    for (const neighbors of this.adjacencyList.values()) for (const neighbor of neighbors) inDegree.set(neighbor, (inDegree.get(neighbor) || 0) + 1);

    return inDegree;
  }
}
