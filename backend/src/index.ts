export * from "./types/analysis";
export { SemanticAnnotator, functionName, shortAddress } from "./analysis/annotator";
export { CallGraph, buildCallGraph } from "./analysis/callGraph";
export { CALL_KINDS, parseCallKind, countCallKinds } from "./analysis/callKinds";
export { describeCallGraph, selectKeyPaths } from "./analysis/describer";
export { serializeCallGraph, deserializeCallGraph } from "./analysis/graphGenerator";
export { SemanticRegistry, defaultRegistry, selectorOf } from "./analysis/knowledgeBase";
export type { SemanticRegistryInit, FunctionPattern, SystemContractEntry } from "./analysis/knowledgeBase";
export { computeMetrics, computeDepth, computeBreadth, rankCentralNodes } from "./analysis/metrics";
export { classifyGovernanceFlow, summarizeDelegatecalls, detectProxyUpgrades } from "./analysis/proxyPatterns";
export { analyzeTrace, analyzeCallGraph } from "./analysis/traceAnalyzer";
export type { TraceAnalysis, AnalyzeOptions } from "./analysis/traceAnalyzer";
export { normalizeTrace, parseQuantity } from "./analysis/traceNormalizer";
export { saveGraph, loadGraph, saveDescription } from "./services/graphStore";
export { renderSvg, renderDot, writeVisualization } from "./services/graphRenderer";
export { FileTraceSource, RpcTraceSource } from "./services/traceLoader";
export type { TraceSource, TraceProvider } from "./services/traceLoader";
export { TraceLoadError, GraphFormatError, ConfigError } from "./lib/errors";
