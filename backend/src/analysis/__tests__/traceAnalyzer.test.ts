import { describe, expect, it } from "vitest";
import { analyzeCallGraph, analyzeTrace } from "../traceAnalyzer";
import { buildCallGraph } from "../callGraph";
import { A, B, C, records } from "./fixtures";

describe("analyzeTrace", () => {
  it("terminates on a reentrant cycle", () => {
    const { report } = analyzeTrace({
      trace_summary: {
        calls: [
          { type: "CALL", from: A, to: B, depth: 1 },
          { type: "DELEGATECALL", from: B, to: C, depth: 2 },
          { type: "CALL", from: C, to: A, depth: 3 }
        ]
      }
    });

    expect(report.nodeCount).toBe(3);
    expect(report.edgeCount).toBe(3);
    expect(report.metrics.depth).toBe(2);
    expect(report.metrics.breadth).toBe(1);
    expect(report.metrics.tracerMaxDepth).toBe(3);
    expect(report.metrics.centralNodes).toEqual([
      { address: A, inDegree: 1 },
      { address: B, inDegree: 1 },
      { address: C, inDegree: 1 }
    ]);
    expect(report.callKindCounts).toEqual({ CALL: 2, DELEGATECALL: 1, STATICCALL: 0, CALLCODE: 0, OTHER: 0 });
    expect(report.initiatingCall).toEqual({ from: A, to: B });
    expect(report.warnings).toEqual([]);
    expect(report.traceHash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("reports an empty trace without throwing", () => {
    const { report } = analyzeTrace({ trace_summary: { calls: [] } });

    expect(report.nodeCount).toBe(0);
    expect(report.edgeCount).toBe(0);
    expect(report.metrics).toEqual({ depth: 0, breadth: 0, centralNodes: [], tracerMaxDepth: 0 });
    expect(report.initiatingCall).toEqual({ from: "unknown", to: "unknown" });
    expect(report.description).toBe(
      "The trace contains no contract interactions (0 nodes, 0 edges, depth 0, breadth 0)."
    );
    expect(report.warnings.map((w) => w.code)).toEqual(["EMPTY_DOCUMENT"]);
    expect(report.graph).toEqual({ format: "proposal-call-graph", version: 1, nodes: [], edges: [] });
  });

  it("produces the same hash for equivalent documents", () => {
    const flat = analyzeTrace([{ type: "CALL", from: A, to: B, value: "0x10" }]).report;
    const decimal = analyzeTrace([{ type: "CALL", from: A.toUpperCase().replace("0X", "0x"), to: B, value: "16" }]).report;
    const different = analyzeTrace([{ type: "CALL", from: A, to: B, value: "17" }]).report;

    expect(decimal.traceHash).toBe(flat.traceHash);
    expect(different.traceHash).not.toBe(flat.traceHash);
  });

  it("honors the central node limit", () => {
    const { report } = analyzeTrace(
      [
        { from: A, to: B },
        { from: A, to: C },
        { from: B, to: C }
      ],
      { centralNodeLimit: 1 }
    );
    expect(report.metrics.centralNodes).toEqual([{ address: C, inDegree: 2 }]);
  });
});

describe("analyzeCallGraph", () => {
  it("defaults the initiating call to the first edge", () => {
    const graph = buildCallGraph(records([[B, C], [C, A]]));
    expect(analyzeCallGraph(graph).report.initiatingCall).toEqual({ from: B, to: C });
  });
});
