import crypto from "crypto";
import { logger } from "../lib/logger";
import { InitiatingCall, NormalizationWarning, TraceAnalysisReport } from "../types/analysis";
import { SemanticAnnotator } from "./annotator";
import { buildCallGraph, CallGraph } from "./callGraph";
import { countCallKinds } from "./callKinds";
import { describeCallGraph } from "./describer";
import { serializeCallGraph } from "./graphGenerator";
import { computeMetrics } from "./metrics";
import { normalizeTrace } from "./traceNormalizer";

const log = logger.child({ module: "traceAnalyzer" });

export interface AnalyzeOptions {
  annotator?: SemanticAnnotator;
  maxNesting?: number;
  centralNodeLimit?: number;
}

export interface TraceAnalysis {
  graph: CallGraph;
  report: TraceAnalysisReport;
}

export function analyzeTrace(document: unknown, opts: AnalyzeOptions = {}): TraceAnalysis {
  const annotator = opts.annotator ?? new SemanticAnnotator();
  const normalized = normalizeTrace(document, { maxNesting: opts.maxNesting, annotator });
  const graph = buildCallGraph(normalized.records);

  return analyzeCallGraph(graph, {
    annotator,
    centralNodeLimit: opts.centralNodeLimit,
    initiatingCall: normalized.initiatingCall,
    warnings: normalized.warnings
  });
}

export interface AnalyzeGraphOptions {
  annotator?: SemanticAnnotator;
  centralNodeLimit?: number;
  initiatingCall?: InitiatingCall;
  warnings?: NormalizationWarning[];
}

// Metrics, description and report for an already-built graph (e.g. one reloaded from disk).
export function analyzeCallGraph(graph: CallGraph, opts: AnalyzeGraphOptions = {}): TraceAnalysis {
  const annotator = opts.annotator ?? new SemanticAnnotator();
  const metrics = computeMetrics(graph, { centralNodeLimit: opts.centralNodeLimit });
  const first = graph.edges[0];
  const initiatingCall = opts.initiatingCall ?? (first ? { from: first.from, to: first.to } : undefined);

  const description = describeCallGraph({ graph, metrics, annotator, initiatingCall });
  const serialized = serializeCallGraph(graph, annotator);

  log.info(
    { nodes: graph.nodeCount, edges: graph.edgeCount, depth: metrics.depth, breadth: metrics.breadth },
    "Call graph analyzed"
  );

  const report: TraceAnalysisReport = {
    traceHash: crypto.createHash("sha256").update(JSON.stringify(serialized.edges)).digest("hex"),
    initiatingCall: initiatingCall ?? { from: "unknown", to: "unknown" },
    nodeCount: graph.nodeCount,
    edgeCount: graph.edgeCount,
    metrics,
    callKindCounts: countCallKinds(graph.edges.map((e) => e.record.callKind)),
    warnings: opts.warnings ?? [],
    description,
    graph: serialized
  };

  return { graph, report };
}
