import { CallKind, CallRecord } from "../../types/analysis";

export const A = `0x${"a".repeat(40)}`;
export const B = `0x${"b".repeat(40)}`;
export const C = `0x${"c".repeat(40)}`;
export const D = `0x${"d".repeat(40)}`;
export const E = `0x${"e".repeat(40)}`;

export const UNISWAP_GOVERNOR = "0x408ed6354d4973f66138c91495f2f2fcbd8724c3";
export const SAFE_MASTER_COPY = "0xd9db270c1b5e3bd161e8c8503c55ceabee709552";

// Builds records with consecutive indexes.
export function records(
  calls: Array<[string, string, CallKind?, Partial<Omit<CallRecord, "index" | "from" | "to" | "callKind">>?]>
): CallRecord[] {
  return calls.map(([from, to, callKind = "CALL", extra = {}], index) => ({
    index,
    callKind,
    from,
    to,
    value: 0n,
    callDepth: 0,
    ...extra
  }));
}

export function chain(length: number): CallRecord[] {
  const addresses = Array.from({ length: length + 1 }, (_, i) => `0x${(i + 0x100).toString(16).padStart(40, "0")}`);
  const calls: Array<[string, string]> = [];
  for (let i = 0; i < length; i += 1) {
    calls.push([addresses[i] ?? "", addresses[i + 1] ?? ""]);
  }
  return records(calls);
}
