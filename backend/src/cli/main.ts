#!/usr/bin/env node
/* eslint-disable no-console */
import path from "path";
import { Command } from "commander";
import { SemanticAnnotator } from "../analysis/annotator";
import { analyzeCallGraph, analyzeTrace, TraceAnalysis } from "../analysis/traceAnalyzer";
import { config } from "../lib/config";
import { errorMessage } from "../lib/errors";
import { loadGraph, saveDescription, saveGraph } from "../services/graphStore";
import { VisualizationFormat, writeVisualization } from "../services/graphRenderer";
import { FileTraceSource, RpcTraceSource, TraceSource } from "../services/traceLoader";
import { TraceAnalysisReport } from "../types/analysis";

interface CliOptions {
  input?: string;
  tx?: string;
  network: string;
  rpcUrl?: string;
  fromGraph?: string;
  graphOutput: string;
  descriptionOutput: string;
  visualize: boolean;
  vizFormat: string;
  json: boolean;
}

const program = new Command();

program
  .name("trace-graph")
  .description("Build the call graph of a proposal execution trace and describe its structure")
  .version("1.0.0");

program
  .option("--input <path>", "Trace report JSON (flat call list or nested call tree)")
  .option("--tx <hash>", "Transaction hash to trace over JSON-RPC")
  .option("--network <network>", "Network name (used for RPC env lookup)", "mainnet")
  .option("--rpc-url <url>", "Explicit RPC URL")
  .option("--from-graph <path>", "Re-analyze a previously saved graph instead of a trace")
  .option("--graph-output <path>", "Where to save the serialized graph", path.join(config.outputDir, "proposal_graph.json"))
  .option(
    "--description-output <path>",
    "Where to save the structural description",
    path.join(config.outputDir, "graph_description.txt")
  )
  .option("--visualize", "Render the graph diagram", config.enableGraphVisualization)
  .option("--viz-format <format>", "Diagram format (svg or dot)", config.graphOutputFormat)
  .option("--json", "Output JSON report", false);

program.action(async (opts: CliOptions) => {
  try {
    const annotator = new SemanticAnnotator();
    let analysis: TraceAnalysis;

    if (opts.fromGraph) {
      const graph = await loadGraph(opts.fromGraph);
      analysis = analyzeCallGraph(graph, { annotator, centralNodeLimit: config.centralNodeLimit });
    } else {
      const source = resolveSource(opts);
      if (!source) {
        console.error("One of --input, --tx or --from-graph is required.");
        process.exitCode = 1;
        return;
      }
      const document = await source.load();
      analysis = analyzeTrace(document, {
        annotator,
        maxNesting: config.maxTraceNesting,
        centralNodeLimit: config.centralNodeLimit
      });
      await saveGraph(analysis.graph, opts.graphOutput, annotator);
    }

    await saveDescription(analysis.report.description, opts.descriptionOutput);

    if (opts.visualize) {
      const format: VisualizationFormat = opts.vizFormat.toLowerCase() === "dot" ? "dot" : "svg";
      const base = path.basename(opts.fromGraph ?? opts.graphOutput, path.extname(opts.fromGraph ?? opts.graphOutput));
      const target = path.join(config.outputDir, `${base}.${format}`);
      await writeVisualization(analysis.graph, analysis.report.metrics, target, format, { annotator });
    }

    if (opts.json) {
      console.log(JSON.stringify(analysis.report, null, 2));
      return;
    }

    printHumanReadable(analysis.report, opts);
  } catch (err) {
    console.error("Analysis failed:", errorMessage(err));
    process.exitCode = 1;
  }
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});

function resolveSource(opts: CliOptions): TraceSource | undefined {
  if (opts.input) {
    return new FileTraceSource(opts.input);
  }
  if (opts.tx) {
    return new RpcTraceSource(opts.tx, { network: opts.network, rpcUrl: opts.rpcUrl });
  }
  return undefined;
}

function printHumanReadable(report: TraceAnalysisReport, opts: CliOptions): void {
  console.log("Proposal Call Graph Summary");
  console.log("====================================\n");

  console.log(`Trace hash: ${report.traceHash}`);
  console.log(`Initiating call: ${report.initiatingCall.from} -> ${report.initiatingCall.to}`);
  console.log(`Nodes: ${report.nodeCount}`);
  console.log(`Edges: ${report.edgeCount}`);
  console.log(`Graph depth: ${report.metrics.depth}`);
  console.log(`Graph breadth: ${report.metrics.breadth}`);
  console.log(`Tracer max depth: ${report.metrics.tracerMaxDepth}\n`);

  if (report.metrics.centralNodes.length > 0) {
    console.log("Central nodes:");
    for (const node of report.metrics.centralNodes) {
      console.log(`  - ${node.address}: ${node.inDegree} inbound call(s)`);
    }
    console.log("");
  }

  if (report.warnings.length > 0) {
    console.log(`Warnings (${report.warnings.length}):`);
    for (const w of report.warnings) {
      console.log(`  - [${w.code}]${w.path ? ` ${w.path}:` : ""} ${w.message}`);
    }
    console.log("");
  }

  console.log(report.description);
  console.log("");
  if (!opts.fromGraph) {
    console.log(`Graph saved to: ${opts.graphOutput}`);
  }
  console.log(`Description saved to: ${opts.descriptionOutput}`);
}
