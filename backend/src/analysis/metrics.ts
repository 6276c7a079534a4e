import { CallRecord, CentralNode, GraphMetrics } from "../types/analysis";
import { CallGraph } from "./callGraph";

export interface MetricsOptions {
  centralNodeLimit?: number;
}

export const DEFAULT_CENTRAL_NODE_LIMIT = 5;

export function computeMetrics(graph: CallGraph, opts: MetricsOptions = {}): GraphMetrics {
  return {
    depth: computeDepth(graph),
    breadth: computeBreadth(graph),
    centralNodes: rankCentralNodes(graph, opts.centralNodeLimit ?? DEFAULT_CENTRAL_NODE_LIMIT),
    tracerMaxDepth: tracerMaxDepth(graph.edges.map((e) => e.record))
  };
}

/**
 * Longest hop count reachable from any root, by monotone relaxation. A node is
 * expanded at most once per root: reaching an expanded node again may still
 * raise its recorded best, but never queues it again, and only expanded depths
 * count towards the result. Self-loops never propagate, and no value may
 * exceed nodeCount - 1, so reentrant cycles cannot inflate the depth.
 */
export function computeDepth(graph: CallGraph): number {
  if (graph.nodeCount === 0) return 0;

  const ceiling = graph.nodeCount - 1;
  let maxDepth = 0;

  for (const root of graph.roots()) {
    const best = new Map<string, number>([[root, 0]]);
    const expanded = new Set<string>();
    const queue: string[] = [root];

    for (let head = 0; head < queue.length; head += 1) {
      const current = queue[head];
      if (current === undefined) break;
      if (expanded.has(current)) continue;
      expanded.add(current);

      const depth = best.get(current) ?? 0;
      if (depth > maxDepth) maxDepth = depth;

      const next = depth + 1;
      if (next > ceiling) continue;

      for (const successor of graph.successors(current)) {
        if (successor === current) continue;
        if (next <= (best.get(successor) ?? -1)) continue;

        best.set(successor, next);
        if (!expanded.has(successor)) queue.push(successor);
      }
    }
  }

  return maxDepth;
}

// Widest BFS layer over all roots; one visited set per root run.
export function computeBreadth(graph: CallGraph): number {
  if (graph.nodeCount === 0) return 0;

  let maxBreadth = 0;

  for (const root of graph.roots()) {
    const visited = new Set<string>([root]);
    let layer: string[] = [root];

    while (layer.length > 0) {
      maxBreadth = Math.max(maxBreadth, layer.length);

      const nextLayer: string[] = [];
      for (const node of layer) {
        for (const successor of graph.successors(node)) {
          if (successor === node || visited.has(successor)) continue;
          visited.add(successor);
          nextLayer.push(successor);
        }
      }
      layer = nextLayer;
    }
  }

  return maxBreadth;
}

export function rankCentralNodes(graph: CallGraph, limit?: number): CentralNode[] {
  // Array.prototype.sort is stable, so equal in-degrees keep first-seen order.
  const ranked = graph.nodes
    .map((address) => ({ address, inDegree: graph.inDegree(address) }))
    .filter((n) => n.inDegree > 0)
    .sort((a, b) => b.inDegree - a.inDegree);

  return limit === undefined ? ranked : ranked.slice(0, limit);
}

export function tracerMaxDepth(records: readonly CallRecord[]): number {
  return records.reduce((max, r) => Math.max(max, r.callDepth), 0);
}
