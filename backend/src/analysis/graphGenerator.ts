import { z } from "zod";
import { GraphFormatError } from "../lib/errors";
import { CallRecord, SerializedCallGraph, SerializedEdge, SerializedNode } from "../types/analysis";
import { nodeLabel, SemanticAnnotator } from "./annotator";
import { buildCallGraph, CallGraph } from "./callGraph";
import { CALL_KINDS } from "./callKinds";
import { label } from "./proxyPatterns";

const GRAPH_FORMAT = "proposal-call-graph";

export function serializeCallGraph(graph: CallGraph, annotator?: SemanticAnnotator): SerializedCallGraph {
  const nodes: SerializedNode[] = graph.nodes.map((address) => {
    const annotation = annotator?.describeAddress(address);
    return {
      id: address,
      label: nodeLabel(address),
      ...(annotation ? { annotation } : {})
    };
  });

  const edges: SerializedEdge[] = graph.edges.map(({ index, from, to, record }) => ({
    id: `edge-${index}`,
    index,
    from,
    to,
    callKind: record.callKind,
    ...(record.rawType !== undefined ? { rawType: record.rawType } : {}),
    value: record.value.toString(),
    function: label(record),
    ...(record.functionSelector ? { functionSelector: record.functionSelector } : {}),
    ...(record.functionSignature ? { functionSignature: record.functionSignature } : {}),
    callDepth: record.callDepth,
    ...(record.gas !== undefined ? { gas: record.gas.toString() } : {}),
    ...(record.gasUsed !== undefined ? { gasUsed: record.gasUsed.toString() } : {}),
    ...(record.error !== undefined ? { error: record.error } : {})
  }));

  return { format: GRAPH_FORMAT, version: 1, nodes, edges };
}

const decimal = z.string().regex(/^[0-9]+$/, "expected a decimal integer string");
const address = z.string().regex(/^0x[0-9a-f]{40}$/, "expected a lowercase 20-byte address");

const SerializedEdgeSchema = z.object({
  id: z.string(),
  index: z.number().int().nonnegative(),
  from: address,
  to: address,
  callKind: z.enum(CALL_KINDS),
  rawType: z.string().optional(),
  value: decimal,
  function: z.string(),
  functionSelector: z.string().optional(),
  functionSignature: z.string().optional(),
  callDepth: z.number().int().nonnegative(),
  gas: decimal.optional(),
  gasUsed: decimal.optional(),
  error: z.string().optional()
});

const SerializedGraphSchema = z.object({
  format: z.literal(GRAPH_FORMAT),
  version: z.literal(1),
  nodes: z.array(z.object({ id: address, label: z.string(), annotation: z.string().optional() })),
  edges: z.array(SerializedEdgeSchema)
});

/**
 * Rebuilds a CallGraph from its serialized form. Edges are replayed through
 * the builder in index order; the node list must match the edge endpoints.
 */
export function deserializeCallGraph(input: unknown): CallGraph {
  const parsed = SerializedGraphSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new GraphFormatError(`Invalid serialized call graph (${issues.join("; ")})`, issues);
  }

  const records: CallRecord[] = [...parsed.data.edges]
    .sort((a, b) => a.index - b.index)
    .map((e, index) => ({
      index,
      callKind: e.callKind,
      rawType: e.rawType,
      from: e.from,
      to: e.to,
      value: BigInt(e.value),
      functionSelector: e.functionSelector,
      functionSignature: e.functionSignature,
      callDepth: e.callDepth,
      gas: e.gas !== undefined ? BigInt(e.gas) : undefined,
      gasUsed: e.gasUsed !== undefined ? BigInt(e.gasUsed) : undefined,
      error: e.error
    }));

  const graph = buildCallGraph(records);

  const declared = parsed.data.nodes.map((n) => n.id);
  const rebuilt = new Set(graph.nodes);
  if (declared.length !== rebuilt.size || declared.some((id) => !rebuilt.has(id))) {
    throw new GraphFormatError("Serialized node list does not match the edge endpoints");
  }

  return graph;
}
