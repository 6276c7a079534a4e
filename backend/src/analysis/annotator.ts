import { isHexString } from "ethers";
import { AddressClassification, FunctionClassification } from "../types/analysis";
import { defaultRegistry, SemanticRegistry } from "./knowledgeBase";

const SELECTOR_RE = /^0x[0-9a-f]{8}$/i;

export class SemanticAnnotator {
  constructor(readonly registry: SemanticRegistry = defaultRegistry) {}

  classifyAddress(address: string): AddressClassification {
    if (!isHexString(address, 20)) {
      return { kind: "unknown" };
    }
    const addr = address.toLowerCase();

    const asNumber = BigInt(addr);
    if (asNumber >= 1n && asNumber <= 9n) {
      const name = this.registry.precompiles.get(Number(asNumber)) ?? `0x${asNumber.toString(16).padStart(2, "0")}`;
      return {
        kind: "system",
        systemKind: "precompile",
        description: `Ethereum Precompile: ${name}`
      };
    }

    const system = this.registry.systemContracts.get(addr);
    if (system) {
      return { kind: "system", systemKind: system.systemKind, description: system.description };
    }

    const known = this.registry.knownContracts.get(addr);
    if (known) {
      return { kind: "known", name: known };
    }

    return { kind: "unknown" };
  }

  // Known name or system description, undefined when unclassified.
  describeAddress(address: string): string | undefined {
    const classification = this.classifyAddress(address);
    switch (classification.kind) {
      case "known":
        return classification.name;
      case "system":
        return classification.description;
      case "unknown":
        return undefined;
    }
  }

  resolveSignature(selector: string): string | undefined {
    if (!SELECTOR_RE.test(selector)) return undefined;
    return this.registry.signaturesBySelector.get(selector.toLowerCase());
  }

  classifyFunction(selectorOrName: string): FunctionClassification | null {
    if (!selectorOrName || selectorOrName === "unknown") return null;

    let text = selectorOrName;
    if (SELECTOR_RE.test(text)) {
      const resolved = this.resolveSignature(text);
      if (!resolved) return null;
      text = resolved;
    }

    const name = functionName(text).toLowerCase();
    if (!name) return null;

    for (const { pattern, label } of this.registry.functionPatterns) {
      if (name.includes(pattern.toLowerCase())) {
        return { pattern, label };
      }
    }
    return null;
  }
}

export function functionName(label: string): string {
  const idx = label.indexOf("(");
  return idx === -1 ? label : label.slice(0, idx);
}

export function shortAddress(address: string): string {
  return address.length > 18 ? `${address.slice(0, 10)}...${address.slice(-8)}` : address;
}

export function nodeLabel(address: string): string {
  return address.length > 18 ? `${address.slice(0, 6)}...${address.slice(-4)}` : address;
}
