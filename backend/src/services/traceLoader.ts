import { promises as fs } from "fs";
import { ethers } from "ethers";
import { config } from "../lib/config";
import { errorMessage, TraceLoadError } from "../lib/errors";
import { logger } from "../lib/logger";

const log = logger.child({ module: "traceLoader" });

export interface TraceSource {
  readonly description: string;
  load(): Promise<unknown>;
}

export class FileTraceSource implements TraceSource {
  constructor(private readonly filePath: string) {}

  get description(): string {
    return `file ${this.filePath}`;
  }

  async load(): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      throw new TraceLoadError(`Trace report not found: ${this.filePath} (${errorMessage(err)})`, this.description);
    }

    log.info({ path: this.filePath }, "Loading trace report");
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new TraceLoadError(`Trace report ${this.filePath} is not valid JSON: ${errorMessage(err)}`, this.description);
    }
  }
}

interface RpcOptions {
  network?: string;
  rpcUrl?: string;
}

// Minimal JSON-RPC surface, so tests can substitute an in-process provider.
export interface TraceProvider {
  send(method: string, params: unknown[]): Promise<unknown>;
  getTransaction(hash: string): Promise<{ from: string; to: string | null } | null>;
}

/**
 * Replays a mined transaction through `debug_traceTransaction` with the
 * built-in callTracer. The result is the nested call tree, wrapped with the
 * original transaction's sender and target.
 */
export class RpcTraceSource implements TraceSource {
  private readonly provider: TraceProvider;

  constructor(
    private readonly txHash: string,
    opts: RpcOptions = {},
    provider?: TraceProvider
  ) {
    if (!ethers.isHexString(txHash, 32)) {
      throw new TraceLoadError(`Invalid transaction hash: ${txHash}`);
    }
    this.provider = provider ?? createProvider(opts);
  }

  get description(): string {
    return `transaction ${this.txHash}`;
  }

  async load(): Promise<unknown> {
    log.info({ tx: this.txHash }, "Fetching call trace");

    let trace: unknown;
    let tx: { from: string; to: string | null } | null;
    try {
      [trace, tx] = await Promise.all([
        this.provider.send("debug_traceTransaction", [this.txHash, { tracer: "callTracer" }]),
        this.provider.getTransaction(this.txHash)
      ]);
    } catch (err) {
      throw new TraceLoadError(`Failed to trace ${this.txHash}: ${errorMessage(err)}`, this.description);
    }

    if (trace === null || trace === undefined) {
      throw new TraceLoadError(`No trace returned for ${this.txHash}`, this.description);
    }

    // Contract creations have no `to`; the callTracer root then names the new contract.
    if (!tx || tx.to === null) {
      return { trace };
    }
    return {
      original_transaction: { hash: this.txHash, from: tx.from, to: tx.to },
      trace
    };
  }
}

function createProvider(opts: RpcOptions): ethers.JsonRpcProvider {
  if (opts.rpcUrl) {
    return new ethers.JsonRpcProvider(opts.rpcUrl);
  }

  const envKey = (opts.network ?? "default").toUpperCase().replace(/-/g, "_");
  const envVar = `RPC_URL_${envKey}`;
  const url = process.env[envVar] || config.rpcUrlDefault;

  if (!url) {
    throw new TraceLoadError(`No RPC URL configured. Set ${envVar} or RPC_URL_DEFAULT in environment variables.`);
  }

  return new ethers.JsonRpcProvider(url);
}
