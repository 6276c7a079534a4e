import { promises as fs } from "fs";
import path from "path";
import { nodeLabel, SemanticAnnotator } from "../analysis/annotator";
import { CallGraph } from "../analysis/callGraph";
import { CALL_KINDS, CallKindInfo, getCallKindInfo } from "../analysis/callKinds";
import { label } from "../analysis/proxyPatterns";
import { errorMessage } from "../lib/errors";
import { logger } from "../lib/logger";
import { CallEdge, GraphMetrics } from "../types/analysis";

const log = logger.child({ module: "graphRenderer" });

export type VisualizationFormat = "svg" | "dot";

export interface RenderOptions {
  width?: number;
  height?: number;
  nodeRadius?: number;
  annotator?: SemanticAnnotator;
}

interface Point {
  x: number;
  y: number;
}

const DASH_ARRAYS: Record<CallKindInfo["dash"], string | undefined> = {
  solid: undefined,
  dashed: "8 4",
  dotted: "2 4",
  dashdot: "8 4 2 4"
};

// Evenly spaced on a circle, first node at twelve o'clock.
export function circularLayout(nodes: readonly string[], width: number, height: number): Map<string, Point> {
  const positions = new Map<string, Point>();
  const cx = width / 2;
  const cy = height / 2;
  const radius = Math.max(0, Math.min(width, height) / 2 - 120);

  nodes.forEach((node, i) => {
    if (nodes.length === 1) {
      positions.set(node, { x: cx, y: cy });
      return;
    }
    const angle = -Math.PI / 2 + (2 * Math.PI * i) / nodes.length;
    positions.set(node, { x: cx + radius * Math.cos(angle), y: cy + radius * Math.sin(angle) });
  });

  return positions;
}

export function renderSvg(graph: CallGraph, metrics: GraphMetrics, opts: RenderOptions = {}): string {
  const width = opts.width ?? 1200;
  const height = opts.height ?? 900;
  const baseRadius = opts.nodeRadius ?? 18;
  const positions = circularLayout(graph.nodes, width, height);

  const maxDegree = Math.max(1, ...graph.nodes.map((n) => Math.max(graph.inDegree(n), graph.outDegree(n))));
  const radii = new Map<string, number>();
  const lines: string[] = [];

  lines.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`
  );
  lines.push("  <defs>");
  for (const kind of CALL_KINDS) {
    const info = getCallKindInfo(kind);
    lines.push(
      `    <marker id="arrow-${kind}" viewBox="0 0 10 10" refX="10" refY="5" markerWidth="8" markerHeight="8" orient="auto-start-reverse">` +
        `<path d="M 0 0 L 10 5 L 0 10 z" fill="${info.color}"/></marker>`
    );
  }
  lines.push("  </defs>");
  lines.push(`  <rect width="${width}" height="${height}" fill="white"/>`);
  lines.push(
    `  <text x="${width / 2}" y="32" text-anchor="middle" font-family="Helvetica, Arial, sans-serif" font-size="20" font-weight="bold" fill="#2c3e50">Proposal Execution Trace Graph</text>`
  );
  lines.push(
    `  <text x="${width / 2}" y="56" text-anchor="middle" font-family="Helvetica, Arial, sans-serif" font-size="14" fill="#2c3e50">` +
      `Nodes: ${graph.nodeCount} | Edges: ${graph.edgeCount} | Depth: ${metrics.depth}</text>`
  );

  for (const node of graph.nodes) {
    const importance = (graph.inDegree(node) * 0.7 + graph.outDegree(node) * 0.3) / maxDegree;
    radii.set(node, baseRadius * (1 + importance * 0.5));
  }

  // Parallel edges between the same ordered pair fan out with growing curvature.
  const pairCounts = new Map<string, number>();
  for (const edge of graph.edges) {
    const key = `${edge.from}->${edge.to}`;
    const ordinal = pairCounts.get(key) ?? 0;
    pairCounts.set(key, ordinal + 1);
    lines.push(`  ${renderEdge(edge, ordinal, positions, radii)}`);
  }

  for (const node of graph.nodes) {
    const p = positions.get(node);
    const r = radii.get(node) ?? baseRadius;
    if (!p) continue;
    const importance = r / baseRadius - 1;
    const lightness = Math.round(82 - importance * 60);
    const annotation = opts.annotator?.describeAddress(node);
    lines.push(
      `  <circle cx="${fmt(p.x)}" cy="${fmt(p.y)}" r="${fmt(r)}" fill="hsl(210, 60%, ${lightness}%)" stroke="#2c3e50" stroke-width="2"/>`
    );
    lines.push(
      `  <text x="${fmt(p.x)}" y="${fmt(p.y + r + 16)}" text-anchor="middle" font-family="Helvetica, Arial, sans-serif" font-size="11" font-weight="bold" fill="#2c3e50">` +
        `${escapeXml(annotation ?? nodeLabel(node))}</text>`
    );
  }

  lines.push(...renderLegend(width));
  lines.push("</svg>");
  return `${lines.join("\n")}\n`;
}

function renderEdge(edge: CallEdge, ordinal: number, positions: Map<string, Point>, radii: Map<string, number>): string {
  const info = getCallKindInfo(edge.record.callKind);
  const dash = DASH_ARRAYS[info.dash];
  const style =
    `fill="none" stroke="${info.color}" stroke-width="${info.width}" stroke-opacity="0.8"` +
    (dash ? ` stroke-dasharray="${dash}"` : "") +
    ` marker-end="url(#arrow-${info.kind})"`;
  const title = `<title>${escapeXml(`${info.kind} ${label(edge.record)}`)}</title>`;

  const from = positions.get(edge.from) ?? { x: 0, y: 0 };
  const to = positions.get(edge.to) ?? { x: 0, y: 0 };
  const rFrom = radii.get(edge.from) ?? 0;
  const rTo = radii.get(edge.to) ?? 0;

  if (edge.from === edge.to) {
    const spread = 30 + ordinal * 12;
    const top = from.y - rFrom;
    const d = `M ${fmt(from.x - 6)} ${fmt(top)} C ${fmt(from.x - spread)} ${fmt(top - spread * 2)} ${fmt(from.x + spread)} ${fmt(top - spread * 2)} ${fmt(from.x + 6)} ${fmt(top)}`;
    return `<path d="${d}" ${style}>${title}</path>`;
  }

  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const dist = Math.hypot(dx, dy) || 1;
  const ux = dx / dist;
  const uy = dy / dist;
  const start = { x: from.x + ux * rFrom, y: from.y + uy * rFrom };
  const end = { x: to.x - ux * rTo, y: to.y - uy * rTo };
  const bend = (0.1 + ordinal * 0.12) * dist;
  const control = { x: (start.x + end.x) / 2 - uy * bend, y: (start.y + end.y) / 2 + ux * bend };

  const d = `M ${fmt(start.x)} ${fmt(start.y)} Q ${fmt(control.x)} ${fmt(control.y)} ${fmt(end.x)} ${fmt(end.y)}`;
  return `<path d="${d}" ${style}>${title}</path>`;
}

function renderLegend(width: number): string[] {
  const x = width - 220;
  const lines = [
    `  <rect x="${x - 12}" y="76" width="214" height="${CALL_KINDS.length * 24 + 16}" rx="6" fill="white" stroke="#34495e" stroke-width="1.5"/>`
  ];
  CALL_KINDS.forEach((kind, i) => {
    const info = getCallKindInfo(kind);
    const y = 100 + i * 24;
    const dash = DASH_ARRAYS[info.dash];
    const text = info.opcode !== undefined ? `${kind} (0x${info.opcode.toString(16)})` : kind;
    lines.push(
      `  <line x1="${x}" y1="${y}" x2="${x + 40}" y2="${y}" stroke="${info.color}" stroke-width="${info.width}"` +
        (dash ? ` stroke-dasharray="${dash}"` : "") +
        "/>"
    );
    lines.push(
      `  <text x="${x + 52}" y="${y + 4}" font-family="Helvetica, Arial, sans-serif" font-size="12" fill="#2c3e50">${text}</text>`
    );
  });
  return lines;
}

export function renderDot(graph: CallGraph, opts: Pick<RenderOptions, "annotator"> = {}): string {
  const lines = [
    "digraph proposal_calls {",
    "  rankdir=LR;",
    '  node [shape=ellipse, style=filled, fillcolor="#d6eaf8", color="#2c3e50", fontname="Helvetica"];',
    '  edge [fontname="Helvetica", fontsize=10];'
  ];

  for (const node of graph.nodes) {
    const text = opts.annotator?.describeAddress(node) ?? nodeLabel(node);
    lines.push(`  ${quoteDot(node)} [label=${quoteDot(text)}];`);
  }

  for (const edge of graph.edges) {
    const info = getCallKindInfo(edge.record.callKind);
    const style = info.dash === "dashdot" ? "dashed" : info.dash;
    lines.push(
      `  ${quoteDot(edge.from)} -> ${quoteDot(edge.to)} ` +
        `[label=${quoteDot(label(edge.record))}, color="${info.color}", style=${style}, penwidth=${info.width}];`
    );
  }

  lines.push("}");
  return `${lines.join("\n")}\n`;
}

/**
 * Writes the diagram. Rendering problems never propagate: they are logged and
 * reported as `false` so textual output can continue.
 */
export async function writeVisualization(
  graph: CallGraph,
  metrics: GraphMetrics,
  outputPath: string,
  format: VisualizationFormat,
  opts: RenderOptions = {}
): Promise<boolean> {
  if (graph.nodeCount === 0) {
    log.warn("Graph is empty, skipping visualization");
    return false;
  }

  try {
    const target = path.extname(outputPath) ? outputPath : `${outputPath}.${format}`;
    const content = format === "dot" ? renderDot(graph, opts) : renderSvg(graph, metrics, opts);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, "utf-8");
    log.info({ path: target, format }, "Graph visualization saved");
    return true;
  } catch (err) {
    log.error({ err: errorMessage(err), path: outputPath }, "Failed to generate visualization");
    return false;
  }
}

function quoteDot(text: string): string {
  return `"${text.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function fmt(n: number): string {
  return n.toFixed(1);
}
