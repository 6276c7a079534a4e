import { promises as fs } from "fs";
import path from "path";
import { SemanticAnnotator } from "../analysis/annotator";
import { CallGraph } from "../analysis/callGraph";
import { deserializeCallGraph, serializeCallGraph } from "../analysis/graphGenerator";
import { errorMessage, GraphFormatError } from "../lib/errors";
import { logger } from "../lib/logger";

const log = logger.child({ module: "graphStore" });

export async function saveGraph(graph: CallGraph, outputPath: string, annotator?: SemanticAnnotator): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  const serialized = serializeCallGraph(graph, annotator);
  await fs.writeFile(outputPath, `${JSON.stringify(serialized, null, 2)}\n`, "utf-8");
  log.info({ path: outputPath, nodes: graph.nodeCount, edges: graph.edgeCount }, "Graph saved");
}

export async function loadGraph(graphPath: string): Promise<CallGraph> {
  const text = await fs.readFile(graphPath, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new GraphFormatError(`Graph file ${graphPath} is not valid JSON: ${errorMessage(err)}`);
  }

  const graph = deserializeCallGraph(parsed);
  log.info({ path: graphPath, nodes: graph.nodeCount, edges: graph.edgeCount }, "Graph loaded");
  return graph;
}

export async function saveDescription(description: string, outputPath: string): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, description, "utf-8");
  log.info({ path: outputPath }, "Description saved");
}
