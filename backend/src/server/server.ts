import express from "express";
import { z } from "zod";
import { analyzeTrace } from "../analysis/traceAnalyzer";
import { config } from "../lib/config";
import { errorMessage, TraceLoadError } from "../lib/errors";
import { logger } from "../lib/logger";
import { RpcTraceSource, TraceSource } from "../services/traceLoader";

const log = logger.child({ module: "server" });

const AnalyzeBodySchema = z.union([
  z.object({
    txHash: z.string().regex(/^0x[0-9a-fA-F]{64}$/, "expected a 32-byte transaction hash"),
    network: z.string().optional(),
    rpcUrl: z.string().url().optional()
  }),
  z.object({
    trace: z.union([z.record(z.unknown()), z.array(z.unknown())])
  })
]);

export interface AppOptions {
  traceSourceFor?: (txHash: string, opts: { network?: string; rpcUrl?: string }) => TraceSource;
}

export function createApp(opts: AppOptions = {}): express.Express {
  const traceSourceFor = opts.traceSourceFor ?? ((txHash, rpc) => new RpcTraceSource(txHash, rpc));

  const app = express();
  app.use(express.json({ limit: "10mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/analyze", async (req, res) => {
    const parsed = AnalyzeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid request body", details: parsed.error.flatten() });
      return;
    }

    const analyzeOptions = {
      maxNesting: config.maxTraceNesting,
      centralNodeLimit: config.centralNodeLimit
    };

    try {
      if ("trace" in parsed.data) {
        const { report } = analyzeTrace(parsed.data.trace, analyzeOptions);
        res.json(report);
      } else {
        const { txHash, network, rpcUrl } = parsed.data;
        const document = await traceSourceFor(txHash, { network, rpcUrl }).load();
        const { report } = analyzeTrace(document, analyzeOptions);
        res.json(report);
      }
    } catch (err) {
      log.error({ err: errorMessage(err) }, "Analysis failed");
      const status = err instanceof TraceLoadError ? 502 : 500;
      res.status(status).json({ error: "Analysis failed", message: errorMessage(err) });
    }
  });

  return app;
}

const app = createApp();

if (require.main === module) {
  app.listen(config.port, () => {
    log.info(`Proposal trace graph API listening on port ${config.port}`);
  });
}

export default app;
