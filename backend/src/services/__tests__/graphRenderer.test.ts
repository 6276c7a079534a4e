import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SemanticAnnotator } from "../../analysis/annotator";
import { buildCallGraph } from "../../analysis/callGraph";
import { computeMetrics } from "../../analysis/metrics";
import { CallKind, CallRecord } from "../../types/analysis";
import { circularLayout, renderDot, renderSvg, writeVisualization } from "../graphRenderer";

const A = `0x${"a".repeat(40)}`;
const B = `0x${"b".repeat(40)}`;
const GOVERNOR = "0x408ed6354d4973f66138c91495f2f2fcbd8724c3";

function call(index: number, from: string, to: string, callKind: CallKind, functionSignature?: string): CallRecord {
  return { index, callKind, from, to, value: 0n, callDepth: index, functionSignature };
}

const graph = buildCallGraph([
  call(0, A, GOVERNOR, "CALL", "propose(address[],uint256[],bytes[],string)"),
  call(1, GOVERNOR, B, "DELEGATECALL"),
  call(2, B, B, "CALLCODE", "a<b>")
]);
const metrics = computeMetrics(graph);
const annotator = new SemanticAnnotator();

describe("circularLayout", () => {
  it("places the first node at twelve o'clock and a lone node at the center", () => {
    const positions = circularLayout(["x", "y"], 400, 400);
    expect(positions.get("x")).toEqual({ x: 200, y: 120 });
    expect(circularLayout(["only"], 400, 300).get("only")).toEqual({ x: 200, y: 150 });
  });
});

describe("renderSvg", () => {
  const svg = renderSvg(graph, metrics, { annotator });

  it("draws a header with graph size", () => {
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="1200" height="900"')).toBe(true);
    expect(svg).toContain(">Proposal Execution Trace Graph</text>");
    expect(svg).toContain(">Nodes: 3 | Edges: 3 | Depth: 2</text>");
  });

  it("styles edges by call kind", () => {
    expect(svg).toContain(
      'stroke="#e74c3c" stroke-width="2.5" stroke-opacity="0.8" stroke-dasharray="8 4" marker-end="url(#arrow-DELEGATECALL)"'
    );
    expect(svg).toContain('stroke="#34495e" stroke-width="2" stroke-opacity="0.8" marker-end="url(#arrow-CALL)"');
    expect(svg).toContain("<title>CALLCODE a&lt;b&gt;</title>");
  });

  it("labels nodes by annotation, falling back to the short address", () => {
    expect(svg).toContain(">Uniswap Governor</text>");
    expect(svg).toContain(">0xaaaa...aaaa</text>");
  });

  it("lists every call kind in the legend", () => {
    expect(svg).toContain(">DELEGATECALL (0xf4)</text>");
    expect(svg).toContain(">STATICCALL (0xfa)</text>");
    expect(svg).toContain(">OTHER</text>");
  });
});

describe("renderDot", () => {
  it("writes one statement per node and edge", () => {
    const lines = renderDot(graph, { annotator }).trimEnd().split("\n");

    expect(lines[0]).toBe("digraph proposal_calls {");
    expect(lines).toContain(`  "${GOVERNOR}" [label="Uniswap Governor"];`);
    expect(lines).toContain(`  "${A}" [label="0xaaaa...aaaa"];`);
    expect(lines).toContain(
      `  "${A}" -> "${GOVERNOR}" [label="propose(address[],uint256[],bytes[],string)", color="#34495e", style=solid, penwidth=2];`
    );
    expect(lines).toContain(`  "${GOVERNOR}" -> "${B}" [label="unknown", color="#e74c3c", style=dashed, penwidth=2.5];`);
    expect(lines).toContain(`  "${B}" -> "${B}" [label="a<b>", color="#8e44ad", style=dashed, penwidth=2];`);
    expect(lines[lines.length - 1]).toBe("}");
  });
});

describe("writeVisualization", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "trace-graph-viz-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes the diagram and appends the format extension", async () => {
    const ok = await writeVisualization(graph, metrics, path.join(dir, "graph"), "dot", { annotator });

    expect(ok).toBe(true);
    expect(await fs.readFile(path.join(dir, "graph.dot"), "utf-8")).toBe(renderDot(graph, { annotator }));
  });

  it("returns false for an empty graph without writing", async () => {
    const empty = buildCallGraph([]);
    const target = path.join(dir, "empty.svg");

    expect(await writeVisualization(empty, computeMetrics(empty), target, "svg")).toBe(false);
    await expect(fs.access(target)).rejects.toThrow();
  });

  it("returns false instead of throwing when the file cannot be written", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "", "utf-8");

    expect(await writeVisualization(graph, metrics, path.join(blocker, "graph.svg"), "svg")).toBe(false);
  });
});
