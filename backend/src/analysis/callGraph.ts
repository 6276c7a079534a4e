import { CallEdge, CallRecord } from "../types/analysis";

/**
 * Directed multigraph of contract interactions. Nodes are lowercase addresses
 * in first-seen order; every call record becomes its own edge, so parallel
 * edges and self-loops are preserved and addressable by edge index.
 */
export class CallGraph {
  private readonly nodeOrder: string[] = [];
  private readonly edgeList: CallEdge[] = [];
  private readonly outgoing = new Map<string, CallEdge[]>();
  private readonly incoming = new Map<string, CallEdge[]>();

  private constructor() {}

  static fromRecords(records: Iterable<CallRecord>): CallGraph {
    const graph = new CallGraph();
    for (const record of records) {
      graph.append(record);
    }
    return graph;
  }

  private append(record: CallRecord): void {
    const from = record.from.toLowerCase();
    const to = record.to.toLowerCase();
    this.addNode(from);
    this.addNode(to);

    const edge: CallEdge = { index: this.edgeList.length, from, to, record };
    this.edgeList.push(edge);
    this.outgoing.get(from)?.push(edge);
    this.incoming.get(to)?.push(edge);
  }

  private addNode(address: string): void {
    if (this.outgoing.has(address)) return;
    this.nodeOrder.push(address);
    this.outgoing.set(address, []);
    this.incoming.set(address, []);
  }

  get nodes(): readonly string[] {
    return this.nodeOrder;
  }

  get edges(): readonly CallEdge[] {
    return this.edgeList;
  }

  get nodeCount(): number {
    return this.nodeOrder.length;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  hasNode(address: string): boolean {
    return this.outgoing.has(address.toLowerCase());
  }

  outEdges(address: string): readonly CallEdge[] {
    return this.outgoing.get(address.toLowerCase()) ?? [];
  }

  inEdges(address: string): readonly CallEdge[] {
    return this.incoming.get(address.toLowerCase()) ?? [];
  }

  inDegree(address: string): number {
    return this.inEdges(address).length;
  }

  outDegree(address: string): number {
    return this.outEdges(address).length;
  }

  // Distinct successors in first-edge order; parallel edges collapse here.
  successors(address: string): string[] {
    const seen = new Set<string>();
    for (const edge of this.outEdges(address)) {
      seen.add(edge.to);
    }
    return Array.from(seen);
  }

  edgesBetween(from: string, to: string): CallEdge[] {
    const target = to.toLowerCase();
    return this.outEdges(from).filter((e) => e.to === target);
  }

  // Nodes with no incoming edge; every node when the graph has none.
  roots(): string[] {
    const roots = this.nodeOrder.filter((n) => this.inDegree(n) === 0);
    return roots.length > 0 ? roots : [...this.nodeOrder];
  }
}

export function buildCallGraph(records: Iterable<CallRecord>): CallGraph {
  return CallGraph.fromRecords(records);
}
