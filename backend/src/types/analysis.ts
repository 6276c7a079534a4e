export type CallKind = "CALL" | "DELEGATECALL" | "STATICCALL" | "CALLCODE" | "OTHER";

export interface CallRecord {
  readonly index: number;
  readonly callKind: CallKind;
  readonly rawType?: string;
  readonly from: string;
  readonly to: string;
  readonly value: bigint;
  readonly functionSelector?: string;
  readonly functionSignature?: string;
  readonly callDepth: number; // tracer-reported, not used by graph metrics
  readonly gas?: bigint;
  readonly gasUsed?: bigint;
  readonly error?: string;
}

export interface CallEdge {
  readonly index: number;
  readonly from: string;
  readonly to: string;
  readonly record: CallRecord;
}

export interface InitiatingCall {
  from: string;
  to: string;
}

export type WarningCode = "EMPTY_DOCUMENT" | "UNRECOGNIZED_SHAPE" | "MALFORMED_RECORD" | "NESTING_TRUNCATED";

export interface NormalizationWarning {
  code: WarningCode;
  message: string;
  path?: string;
}

export interface NormalizedTrace {
  records: CallRecord[];
  warnings: NormalizationWarning[];
  initiatingCall?: InitiatingCall;
}

export interface CentralNode {
  address: string;
  inDegree: number;
}

export interface GraphMetrics {
  depth: number;
  breadth: number;
  centralNodes: CentralNode[];
  tracerMaxDepth: number;
}

export type SystemKind = "precompile" | "l2-system";

export type AddressClassification =
  | { kind: "unknown" }
  | { kind: "known"; name: string }
  | { kind: "system"; systemKind: SystemKind; description: string };

export interface FunctionClassification {
  pattern: string;
  label: string;
}

export interface SerializedNode {
  id: string;
  label: string;
  annotation?: string;
}

export interface SerializedEdge {
  id: string;
  index: number;
  from: string;
  to: string;
  callKind: CallKind;
  rawType?: string;
  value: string;
  function: string;
  functionSelector?: string;
  functionSignature?: string;
  callDepth: number;
  gas?: string;
  gasUsed?: string;
  error?: string;
}

export interface SerializedCallGraph {
  format: "proposal-call-graph";
  version: 1;
  nodes: SerializedNode[];
  edges: SerializedEdge[];
}

export type CallKindCounts = Record<CallKind, number>;

export interface TraceAnalysisReport {
  traceHash: string;
  initiatingCall: InitiatingCall;
  nodeCount: number;
  edgeCount: number;
  metrics: GraphMetrics;
  callKindCounts: CallKindCounts;
  warnings: NormalizationWarning[];
  description: string;
  graph: SerializedCallGraph;
}
