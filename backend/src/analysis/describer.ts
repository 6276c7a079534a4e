import { CallRecord, GraphMetrics, InitiatingCall } from "../types/analysis";
import { functionName, SemanticAnnotator, shortAddress } from "./annotator";
import { CallGraph } from "./callGraph";
import { CALL_KINDS, countCallKinds } from "./callKinds";
import { classifyGovernanceFlow, detectProxyUpgrades, GovernanceFlow, label, summarizeDelegatecalls } from "./proxyPatterns";

export interface DescribeInput {
  graph: CallGraph;
  metrics: GraphMetrics;
  annotator: SemanticAnnotator;
  initiatingCall?: InitiatingCall;
}

const TOP_FUNCTIONS = 5;
const TOP_CENTRAL = 5;
const FUNCTIONS_PER_NODE = 3;
const MAX_KEY_PATHS = 2;

const GOVERNANCE_NARRATIVE: Record<Exclude<GovernanceFlow, "none">, string> = {
  "multisig-proposal":
    "The trace follows a standard DAO governance flow: a multisig wallet (Gnosis Safe) executes a transaction " +
    "that calls the Governor contract to create a proposal. This is the proposal creation stage, not the execution stage.",
  "multisig-execution":
    "The trace contains a multisig execution (execTransaction), indicating the operation was initiated through a multisig wallet.",
  "proposal-creation":
    "The trace contains proposal creation (propose), indicating a DAO governance proposal creation flow."
};

/**
 * Structural narrative of a call graph. Sentence order is fixed: initiating
 * call, key functions, call kinds, central nodes, size, key paths, delegate /
 * static / upgrade narratives, governance flow. Output depends only on the
 * inputs.
 */
export function describeCallGraph(input: DescribeInput): string {
  const { graph, metrics, annotator } = input;

  if (graph.edgeCount === 0) {
    return (
      "The trace contains no contract interactions " +
      `(0 nodes, 0 edges, depth ${metrics.depth}, breadth ${metrics.breadth}).`
    );
  }

  const records = graph.edges.map((e) => e.record);
  const parts: string[] = [];

  parts.push(describeInitiatingCall(input.initiatingCall, annotator));

  const { counts, byAddress } = tallyFunctions(records);
  const topFunctions = Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, TOP_FUNCTIONS)
    .map(([name, count]) => {
      const semantic = annotator.classifyFunction(name);
      return semantic ? `${name} (${semantic.label}, ${times(count, "call")})` : `${name} (${times(count, "call")})`;
    });
  if (topFunctions.length > 0) {
    parts.push(`Key function calls: ${topFunctions.join(", ")}.`);
  }

  const kindCounts = countCallKinds(records.map((r) => r.callKind));
  const kinds = CALL_KINDS.filter((k) => kindCounts[k] > 0).map((k) => `${k} ${kindCounts[k]}`);
  parts.push(`Call kinds: ${kinds.join(", ")}.`);

  const central = metrics.centralNodes.slice(0, TOP_CENTRAL).map(({ address, inDegree }) => {
    const name = annotator.describeAddress(address);
    const subject = name ? `${name} (${address})` : `contract ${shortAddress(address)}`;
    const funcs = (byAddress.get(address) ?? []).slice(0, FUNCTIONS_PER_NODE);
    const withFuncs = funcs.length > 0 ? ` with ${funcs.join(", ")}` : "";
    return `${subject} called ${times(inDegree, "time")}${withFuncs}`;
  });
  if (central.length > 0) {
    parts.push(`Central nodes: ${central.join("; ")}.`);
  }

  parts.push(
    `The graph has ${graph.nodeCount} nodes and ${graph.edgeCount} interactions, ` +
      `with a maximum depth of ${metrics.depth} and a maximum breadth of ${metrics.breadth}; ` +
      `the deepest tracer-reported call depth is ${metrics.tracerMaxDepth}.`
  );

  const paths = selectKeyPaths(records, annotator.registry.importantFunctions).map((r) => {
    const target = annotator.describeAddress(r.to) ?? `${r.to.slice(0, 10)}...`;
    return `${r.from.slice(0, 10)}... -> ${target} calls ${functionName(label(r))} (depth ${r.callDepth})`;
  });
  if (paths.length > 0) {
    parts.push(`Key call paths: ${paths.join("; ")}.`);
  }

  const delegates = summarizeDelegatecalls(graph, annotator);
  if (delegates.count > 0) {
    const involving = delegates.annotatedTargets.length > 0 ? `, involving ${delegates.annotatedTargets.join(", ")},` : "";
    parts.push(
      `DELEGATECALL is used ${times(delegates.count, "time")}${involving} indicating a proxy pattern ` +
        "in which core logic reaches implementation contracts through delegated execution."
    );
  }

  if (kindCounts.STATICCALL > 0) {
    parts.push(
      `STATICCALL is used ${times(kindCounts.STATICCALL, "time")} to read contract state without modifying on-chain data.`
    );
  }

  const upgrades = detectProxyUpgrades(graph);
  if (upgrades.length > 0) {
    const list = upgrades.map((u) => `${functionName(u.function)} on ${annotator.describeAddress(u.proxy) ?? u.proxy}`);
    parts.push(`Proxy implementation changes are requested via ${list.join(", ")}.`);
  }

  const flow = classifyGovernanceFlow(records);
  if (flow !== "none") {
    parts.push(GOVERNANCE_NARRATIVE[flow]);
  }

  return parts.join(" ");
}

function describeInitiatingCall(call: InitiatingCall | undefined, annotator: SemanticAnnotator): string {
  if (!call) {
    return "The initiating call of the proposal is unknown.";
  }
  const fromName = annotator.describeAddress(call.from);
  const toName = annotator.describeAddress(call.to);
  const from = fromName ? `${fromName} (${call.from})` : `address ${call.from}`;
  const to = toName ? `${toName} (${call.to})` : `contract ${call.to}`;
  return `After the proposal starts, ${from} first calls ${to}.`;
}

function tallyFunctions(records: readonly CallRecord[]): {
  counts: Map<string, number>;
  byAddress: Map<string, string[]>;
} {
  const counts = new Map<string, number>();
  const byAddress = new Map<string, string[]>();

  for (const record of records) {
    const name = functionName(label(record));
    if (!name || name === "unknown") continue;

    counts.set(name, (counts.get(name) ?? 0) + 1);
    const names = byAddress.get(record.to) ?? [];
    if (!names.includes(name)) names.push(name);
    byAddress.set(record.to, names);
  }

  return { counts, byAddress };
}

/**
 * The first call at the deepest tracer depth, then calls to important
 * functions, without repeats.
 */
export function selectKeyPaths(
  records: readonly CallRecord[],
  importantFunctions: readonly string[],
  maxPaths: number = MAX_KEY_PATHS
): CallRecord[] {
  const selected: CallRecord[] = [];
  if (records.length === 0) return selected;

  const deepest = records.reduce((max, r) => Math.max(max, r.callDepth), 0);
  const representative = records.find((r) => r.callDepth === deepest);
  if (representative) selected.push(representative);

  for (const record of records) {
    if (selected.length >= maxPaths) break;
    if (selected.includes(record)) continue;
    const fn = label(record);
    if (importantFunctions.some((imp) => fn.includes(imp))) {
      selected.push(record);
    }
  }

  return selected.slice(0, maxPaths);
}

function times(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? "" : "s"}`;
}
