import { CallRecord } from "../types/analysis";
import { SemanticAnnotator } from "./annotator";
import { CallGraph } from "./callGraph";

export interface DelegateSummary {
  count: number;
  annotatedTargets: string[];
}

export type GovernanceFlow = "multisig-proposal" | "multisig-execution" | "proposal-creation" | "none";

export interface ProxyUpgrade {
  proxy: string;
  function: string;
}

export function label(record: CallRecord): string {
  return record.functionSignature ?? record.functionSelector ?? "unknown";
}

export function summarizeDelegatecalls(graph: CallGraph, annotator: SemanticAnnotator): DelegateSummary {
  const targets: string[] = [];
  let count = 0;

  for (const edge of graph.edges) {
    if (edge.record.callKind !== "DELEGATECALL") continue;
    count += 1;
    const name = annotator.describeAddress(edge.to);
    if (name && !targets.includes(name)) {
      targets.push(name);
    }
  }

  return { count, annotatedTargets: targets };
}

// Calls that swap a proxy's implementation (upgradeTo / upgradeToAndCall).
export function detectProxyUpgrades(graph: CallGraph): ProxyUpgrade[] {
  return graph.edges
    .filter((e) => /upgradeto/i.test(label(e.record)))
    .map((e) => ({ proxy: e.to, function: label(e.record) }));
}

export function classifyGovernanceFlow(records: readonly CallRecord[]): GovernanceFlow {
  const hasExecTransaction = records.some((r) => label(r).includes("execTransaction"));
  const hasPropose = records.some((r) => label(r).toLowerCase().includes("propose"));

  if (hasExecTransaction && hasPropose) return "multisig-proposal";
  if (hasExecTransaction) return "multisig-execution";
  if (hasPropose) return "proposal-creation";
  return "none";
}
