import { CallKind, CallKindCounts } from "../types/analysis";

export interface CallKindInfo {
  kind: CallKind;
  opcode?: number;
  color: string;
  dash: "solid" | "dashed" | "dotted" | "dashdot";
  width: number;
}

// Enumeration order is the reporting order everywhere (descriptions, legends, counts).
export const CALL_KINDS = ["CALL", "DELEGATECALL", "STATICCALL", "CALLCODE", "OTHER"] as const satisfies readonly CallKind[];

const CALL_KIND_INFO: Record<CallKind, CallKindInfo> = {
  CALL: { kind: "CALL", opcode: 0xf1, color: "#34495e", dash: "solid", width: 2 },
  DELEGATECALL: { kind: "DELEGATECALL", opcode: 0xf4, color: "#e74c3c", dash: "dashed", width: 2.5 },
  STATICCALL: { kind: "STATICCALL", opcode: 0xfa, color: "#3498db", dash: "dotted", width: 2 },
  CALLCODE: { kind: "CALLCODE", opcode: 0xf2, color: "#8e44ad", dash: "dashdot", width: 2 },
  OTHER: { kind: "OTHER", color: "#95a5a6", dash: "solid", width: 1.5 }
};

export function parseCallKind(raw: unknown): CallKind {
  if (typeof raw !== "string") return "OTHER";

  switch (raw.trim().toUpperCase()) {
    case "CALL":
      return "CALL";
    case "DELEGATECALL":
      return "DELEGATECALL";
    case "STATICCALL":
      return "STATICCALL";
    case "CALLCODE":
      return "CALLCODE";
    default:
      // CREATE, CREATE2, SELFDESTRUCT and anything unrecognized
      return "OTHER";
  }
}

export function getCallKindInfo(kind: CallKind): CallKindInfo {
  return CALL_KIND_INFO[kind];
}

export function emptyCallKindCounts(): CallKindCounts {
  return { CALL: 0, DELEGATECALL: 0, STATICCALL: 0, CALLCODE: 0, OTHER: 0 };
}

export function countCallKinds(kinds: Iterable<CallKind>): CallKindCounts {
  const counts = emptyCallKindCounts();
  for (const kind of kinds) {
    counts[kind] += 1;
  }
  return counts;
}
