import { getBigInt, isHexString } from "ethers";
import { z } from "zod";
import { logger } from "../lib/logger";
import { CallRecord, InitiatingCall, NormalizationWarning, NormalizedTrace } from "../types/analysis";
import { SemanticAnnotator } from "./annotator";
import { parseCallKind } from "./callKinds";

const log = logger.child({ module: "traceNormalizer" });

export const DEFAULT_MAX_NESTING = 50;

export interface NormalizeOptions {
  maxNesting?: number;
  annotator?: SemanticAnnotator;
}

const addressSchema = z.string().refine((v) => isHexString(v, 20), "not a 20-byte hex address");

const quantitySchema = z.union([z.bigint(), z.number(), z.string()]).transform((raw, ctx) => {
  const parsed = parseQuantity(raw);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable quantity ${String(raw)}` });
    return z.NEVER;
  }
  return parsed;
});

const optionalText = z.string().optional().catch(undefined);

const CallEntrySchema = z.object({
  from: addressSchema,
  to: addressSchema,
  type: optionalText,
  value: quantitySchema.nullish(),
  gas: quantitySchema.nullish(),
  gas_used: quantitySchema.nullish(),
  gasUsed: quantitySchema.nullish(),
  depth: z.number().int().nonnegative().optional().catch(undefined),
  function_selector: optionalText,
  function_signature: optionalText,
  input: optionalText,
  error: optionalText
});

type CallEntry = z.infer<typeof CallEntrySchema>;

type Shape =
  | { kind: "flat"; entries: unknown[]; path: string }
  | { kind: "nested"; root: Record<string, unknown>; path: string }
  | { kind: "empty" }
  | { kind: "unrecognized" };

/**
 * Flattens a trace document into call records. Accepts the flat
 * `trace_summary.calls` / `summary.calls` lists, a bare list of entries, or a
 * nested call tree (`child_calls`, or `calls` as emitted by callTracer).
 * Bad entries are dropped with a warning; this function never throws.
 */
export function normalizeTrace(document: unknown, opts: NormalizeOptions = {}): NormalizedTrace {
  const maxNesting = opts.maxNesting ?? DEFAULT_MAX_NESTING;
  const annotator = opts.annotator ?? new SemanticAnnotator();
  const warnings: NormalizationWarning[] = [];
  const records: CallRecord[] = [];

  const warn = (warning: NormalizationWarning): void => {
    warnings.push(warning);
    log.warn({ code: warning.code, path: warning.path }, warning.message);
  };

  const accept = (raw: unknown, path: string, traversalDepth: number): Record<string, unknown> | null => {
    const parsed = CallEntrySchema.safeParse(raw);
    if (parsed.success) {
      records.push(toRecord(parsed.data, records.length, traversalDepth, annotator));
    } else {
      const reasons = parsed.error.issues.map((i) => `${i.path.join(".") || "entry"}: ${i.message}`);
      warn({ code: "MALFORMED_RECORD", message: `Skipping call entry (${reasons.join("; ")})`, path });
    }
    // children of a skipped entry are still visited
    return isRecord(raw) ? raw : null;
  };

  const shape = detectShape(document);

  switch (shape.kind) {
    case "empty":
      warn({ code: "EMPTY_DOCUMENT", message: "Trace document is empty; no calls to analyze" });
      break;
    case "unrecognized":
      warn({ code: "UNRECOGNIZED_SHAPE", message: "Trace document has neither a call list nor a call tree" });
      break;
    case "flat":
      shape.entries.forEach((entry, i) => {
        accept(entry, `${shape.path}[${i}]`, 0);
      });
      break;
    case "nested": {
      const visit = (node: unknown, path: string, depth: number): void => {
        const obj = accept(node, path, depth);
        if (!obj) return;

        const { children, key } = childCalls(obj);
        if (children.length === 0) return;

        if (depth + 1 > maxNesting) {
          warn({
            code: "NESTING_TRUNCATED",
            message: `Call tree exceeds ${maxNesting} nested levels; ${children.length} child call(s) not visited`,
            path
          });
          return;
        }
        children.forEach((child, i) => visit(child, `${path}.${key}[${i}]`, depth + 1));
      };
      visit(shape.root, shape.path, 0);
      break;
    }
  }

  return { records, warnings, initiatingCall: findInitiatingCall(document, records) };
}

function detectShape(document: unknown): Shape {
  if (document === null || document === undefined) return { kind: "empty" };

  if (Array.isArray(document)) {
    return document.length === 0 ? { kind: "empty" } : { kind: "flat", entries: document, path: "calls" };
  }

  if (!isRecord(document)) return { kind: "unrecognized" };
  if (Object.keys(document).length === 0) return { kind: "empty" };

  for (const key of ["trace_summary", "summary"] as const) {
    const summary = document[key];
    if (isRecord(summary) && Array.isArray(summary.calls)) {
      return summary.calls.length === 0
        ? { kind: "empty" }
        : { kind: "flat", entries: summary.calls, path: `${key}.calls` };
    }
  }

  const trace = document.trace;
  if (isRecord(trace) && ("from" in trace || "to" in trace)) {
    return { kind: "nested", root: trace, path: "trace" };
  }

  if ("from" in document || "to" in document || "child_calls" in document || "calls" in document) {
    return { kind: "nested", root: document, path: "$" };
  }

  return { kind: "unrecognized" };
}

function childCalls(node: Record<string, unknown>): { children: unknown[]; key: string } {
  if (Array.isArray(node.child_calls)) return { children: node.child_calls, key: "child_calls" };
  if (Array.isArray(node.calls)) return { children: node.calls, key: "calls" };
  return { children: [], key: "calls" };
}

function toRecord(entry: CallEntry, index: number, traversalDepth: number, annotator: SemanticAnnotator): CallRecord {
  const functionSelector = pickSelector(entry);
  const functionSignature = pickSignature(entry, functionSelector, annotator);

  return {
    index,
    callKind: parseCallKind(entry.type),
    rawType: entry.type,
    from: entry.from.toLowerCase(),
    to: entry.to.toLowerCase(),
    value: entry.value ?? 0n,
    functionSelector,
    functionSignature,
    callDepth: entry.depth ?? traversalDepth,
    gas: entry.gas ?? undefined,
    gasUsed: entry.gas_used ?? entry.gasUsed ?? undefined,
    error: entry.error
  };
}

function pickSelector(entry: CallEntry): string | undefined {
  if (entry.function_selector && isHexString(entry.function_selector, 4)) {
    return entry.function_selector.toLowerCase();
  }
  if (entry.input && entry.input.length >= 10) {
    const head = entry.input.slice(0, 10);
    if (isHexString(head, 4)) return head.toLowerCase();
  }
  return undefined;
}

function pickSignature(entry: CallEntry, selector: string | undefined, annotator: SemanticAnnotator): string | undefined {
  const supplied = entry.function_signature?.trim();
  if (supplied && supplied !== "unknown" && supplied.toLowerCase() !== selector) {
    return supplied;
  }
  return selector ? annotator.resolveSignature(selector) : undefined;
}

function findInitiatingCall(document: unknown, records: CallRecord[]): InitiatingCall | undefined {
  if (isRecord(document)) {
    for (const key of ["original_transaction", "trace"] as const) {
      const tx = document[key];
      if (isRecord(tx) && isAddress(tx.from) && isAddress(tx.to)) {
        return { from: tx.from.toLowerCase(), to: tx.to.toLowerCase() };
      }
    }
  }
  const first = records[0];
  return first ? { from: first.from, to: first.to } : undefined;
}

/**
 * Parses wei / gas quantities without precision loss. Accepts bigint,
 * non-negative safe integers, decimal strings and 0x-prefixed hex.
 */
export function parseQuantity(raw: bigint | number | string): bigint | null {
  if (typeof raw === "bigint") {
    return raw >= 0n ? raw : null;
  }
  if (typeof raw === "number") {
    return Number.isSafeInteger(raw) && raw >= 0 ? BigInt(raw) : null;
  }

  const text = raw.trim();
  if (text === "0x" || text === "0X") return 0n;
  if (/^0x[0-9a-f]+$/i.test(text) || /^[0-9]+$/.test(text)) {
    return getBigInt(text.toLowerCase());
  }
  return null;
}

function isAddress(value: unknown): value is string {
  return typeof value === "string" && isHexString(value, 20);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
