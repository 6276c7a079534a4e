import { describe, expect, it } from "vitest";
import { GraphFormatError } from "../../lib/errors";
import { SemanticAnnotator } from "../annotator";
import { buildCallGraph } from "../callGraph";
import { deserializeCallGraph, serializeCallGraph } from "../graphGenerator";
import { A, B, C, records, UNISWAP_GOVERNOR } from "./fixtures";

const huge = 2n ** 100n + 7n;

const graph = buildCallGraph(
  records([
    [A, UNISWAP_GOVERNOR, "CALL", { value: huge, functionSignature: "propose(address[],uint256[],bytes[],string)", gas: 30_000n }],
    [UNISWAP_GOVERNOR, B, "DELEGATECALL", { functionSelector: "0x12345678", callDepth: 1, error: "execution reverted" }],
    [B, B, "OTHER", { rawType: "CREATE2", callDepth: 2, gasUsed: 5n }],
    [A, UNISWAP_GOVERNOR, "CALL"]
  ])
);

describe("serializeCallGraph", () => {
  it("writes nodes with labels and annotations", () => {
    const serialized = serializeCallGraph(graph, new SemanticAnnotator());

    expect(serialized.format).toBe("proposal-call-graph");
    expect(serialized.version).toBe(1);
    expect(serialized.nodes).toEqual([
      { id: A, label: "0xaaaa...aaaa" },
      { id: UNISWAP_GOVERNOR, label: "0x408e...24c3", annotation: "Uniswap Governor" },
      { id: B, label: "0xbbbb...bbbb" }
    ]);
  });

  it("writes quantities as decimal strings and keeps edge identity", () => {
    const { edges } = serializeCallGraph(graph);

    expect(edges).toHaveLength(4);
    expect(edges[0]).toEqual({
      id: "edge-0",
      index: 0,
      from: A,
      to: UNISWAP_GOVERNOR,
      callKind: "CALL",
      value: "1267650600228229401496703205383",
      function: "propose(address[],uint256[],bytes[],string)",
      functionSignature: "propose(address[],uint256[],bytes[],string)",
      callDepth: 0,
      gas: "30000"
    });
    expect(edges[1]).toMatchObject({ function: "0x12345678", functionSelector: "0x12345678", error: "execution reverted" });
    expect(edges[2]).toMatchObject({ callKind: "OTHER", rawType: "CREATE2", function: "unknown", gasUsed: "5" });
    expect(edges[3]?.id).toBe("edge-3");
  });
});

describe("deserializeCallGraph", () => {
  it("restores an equivalent graph through JSON", () => {
    const restored = deserializeCallGraph(JSON.parse(JSON.stringify(serializeCallGraph(graph))));

    expect(restored.nodes).toEqual(graph.nodes);
    expect(restored.edgeCount).toBe(4);
    expect(restored.edges.map((e) => e.record)).toEqual(graph.edges.map((e) => e.record));
    expect(restored.edges[0]?.record.value).toBe(huge);
  });

  it("replays edges in index order", () => {
    const serialized = serializeCallGraph(graph);
    const shuffled = { ...serialized, edges: [...serialized.edges].reverse() };

    expect(deserializeCallGraph(shuffled).edges.map((e) => e.record.callKind)).toEqual([
      "CALL",
      "DELEGATECALL",
      "OTHER",
      "CALL"
    ]);
  });

  it("round-trips an empty graph", () => {
    const empty = deserializeCallGraph(serializeCallGraph(buildCallGraph([])));
    expect(empty.nodeCount).toBe(0);
    expect(empty.edgeCount).toBe(0);
  });

  it("rejects malformed documents", () => {
    const serialized = serializeCallGraph(graph);

    expect(() => deserializeCallGraph({ nodes: [], edges: [] })).toThrow(GraphFormatError);
    expect(() => deserializeCallGraph(null)).toThrow(GraphFormatError);
    expect(() =>
      deserializeCallGraph({ ...serialized, edges: serialized.edges.map((e) => ({ ...e, value: "-1" })) })
    ).toThrow(GraphFormatError);
    expect(() =>
      deserializeCallGraph({ ...serialized, edges: serialized.edges.map((e) => ({ ...e, callKind: "JUMP" })) })
    ).toThrow(GraphFormatError);
  });

  it("rejects a node list that disagrees with the edges", () => {
    const serialized = serializeCallGraph(graph);
    const withExtra = { ...serialized, nodes: [...serialized.nodes, { id: C, label: "0xcccc...cccc" }] };

    expect(() => deserializeCallGraph(withExtra)).toThrow("Serialized node list does not match the edge endpoints");
  });
});
