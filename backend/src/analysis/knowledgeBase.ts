import { id } from "ethers";
import { SystemKind } from "../types/analysis";

export interface FunctionPattern {
  pattern: string;
  label: string;
}

export interface SystemContractEntry {
  systemKind: SystemKind;
  description: string;
}

export interface SemanticRegistryInit {
  knownContracts?: Record<string, string>;
  systemContracts?: Record<string, SystemContractEntry>;
  precompiles?: Record<number, string>;
  functionPatterns?: FunctionPattern[];
  signatures?: string[];
  importantFunctions?: string[];
}

/**
 * Read-only lookup tables used by the annotator. Instances are frozen on
 * construction and may be shared across concurrent analyses.
 */
export class SemanticRegistry {
  readonly knownContracts: ReadonlyMap<string, string>;
  readonly systemContracts: ReadonlyMap<string, SystemContractEntry>;
  readonly precompiles: ReadonlyMap<number, string>;
  readonly functionPatterns: readonly FunctionPattern[];
  readonly signaturesBySelector: ReadonlyMap<string, string>;
  readonly importantFunctions: readonly string[];

  constructor(init: SemanticRegistryInit = {}) {
    this.knownContracts = lowerKeys(init.knownContracts ?? {});
    this.systemContracts = lowerKeys(init.systemContracts ?? {});
    this.precompiles = new Map(
      Object.entries(init.precompiles ?? {}).map(([n, name]) => [Number(n), name] as const)
    );
    this.functionPatterns = Object.freeze((init.functionPatterns ?? []).map((p) => Object.freeze({ ...p })));
    this.signaturesBySelector = new Map((init.signatures ?? []).map((sig) => [selectorOf(sig), sig] as const));
    this.importantFunctions = Object.freeze([...(init.importantFunctions ?? [])]);
    Object.freeze(this);
  }
}

export function selectorOf(signature: string): string {
  return id(signature).slice(0, 10);
}

function lowerKeys<T>(table: Record<string, T>): ReadonlyMap<string, T> {
  return new Map(Object.entries(table).map(([k, v]) => [k.toLowerCase(), v] as const));
}

export const PRECOMPILES: Record<number, string> = {
  1: "ECRecover",
  2: "SHA256",
  3: "RIPEMD160",
  4: "Identity",
  5: "ModExp",
  6: "ECAdd",
  7: "ECMul",
  8: "ECPairing",
  9: "Blake2F"
};

export const SYSTEM_CONTRACTS: Record<string, SystemContractEntry> = {
  "0x0000000000000000000000000000000000000064": { systemKind: "l2-system", description: "Arbitrum: ArbSys" },
  "0x000000000000000000000000000000000000006b": { systemKind: "l2-system", description: "Arbitrum: ArbOwnerPublic" },
  "0x000000000000000000000000000000000000006c": { systemKind: "l2-system", description: "Arbitrum: ArbGasInfo" },
  "0x000000000000000000000000000000000000006e": { systemKind: "l2-system", description: "Arbitrum: ArbRetryableTx" }
};

export const KNOWN_CONTRACTS: Record<string, string> = {
  // Gnosis Safe
  "0x3e5c63644e683549055b9be8653de26e0b4cd36e": "Gnosis Safe: Proxy Factory",
  "0xd9db270c1b5e3bd161e8c8503c55ceabee709552": "Gnosis Safe: Master Copy",
  "0xa6b71e26c5e0845f74c812102ca7114b6a896ab2": "Gnosis Safe: Proxy Factory v1.3.0",
  // Governors
  "0xf07ded9dc292157749b6fd268e37df6ea38395b9": "Arbitrum Governor",
  "0xb4c064f466931b8d0f637654c916e3f203c46f13": "Arbitrum Governor (Proposer)",
  "0x408ed6354d4973f66138c91495f2f2fcbd8724c3": "Uniswap Governor"
};

// First match wins: longer names that contain a shorter pattern come first.
export const FUNCTION_PATTERNS: FunctionPattern[] = [
  { pattern: "execTransaction", label: "Gnosis Safe: Multi-sig execution" },
  { pattern: "propose", label: "Governor: Proposal creation" },
  { pattern: "upgradeToAndCall", label: "Proxy: Upgrade and call" },
  { pattern: "upgradeTo", label: "Proxy: Upgrade" },
  { pattern: "execute", label: "Governor: Proposal execution" },
  { pattern: "castVote", label: "Governor: Voting" },
  { pattern: "getPastVotes", label: "Governor: Vote weight query" },
  { pattern: "delegate", label: "Governor: Delegation" },
  { pattern: "queue", label: "Governor: Proposal queueing" },
  { pattern: "schedule", label: "Timelock: Operation scheduling" }
];

export const COMMON_SIGNATURES: string[] = [
  "transfer(address,uint256)",
  "transferFrom(address,address,uint256)",
  "approve(address,uint256)",
  "mint(address,uint256)",
  "burn(uint256)",
  "execute(address,uint256,bytes)",
  "implementation()",
  "owner()",
  "renounceOwnership()",
  "transferOwnership(address)",
  "balanceOf(address)",
  "totalSupply()",
  "name()",
  "symbol()",
  "decimals()",
  "allowance(address,address)",
  "claim()",
  "claimable(address)",
  "withdraw(uint256)",
  "getReward()",
  "paused()",
  "pause()",
  "unpause()",
  "upgradeTo(address)",
  "upgradeToAndCall(address,bytes)",
  "execTransaction(address,uint256,bytes,uint8,uint256,uint256,uint256,address,address,bytes)",
  "propose(address[],uint256[],bytes[],string)",
  "castVote(uint256,uint8)",
  "delegate(address)"
];

export const IMPORTANT_FUNCTIONS: string[] = ["execTransaction", "propose", "execute", "upgradeTo"];

export const defaultRegistry = new SemanticRegistry({
  knownContracts: KNOWN_CONTRACTS,
  systemContracts: SYSTEM_CONTRACTS,
  precompiles: PRECOMPILES,
  functionPatterns: FUNCTION_PATTERNS,
  signatures: COMMON_SIGNATURES,
  importantFunctions: IMPORTANT_FUNCTIONS
});
