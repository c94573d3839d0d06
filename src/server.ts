import express, { Request, Response } from "express";
import cors from "cors";
import { resolveAppConfig } from "./config/appConfig.js";
import { createEngineRuntime } from "./bootstrap.js";
import { handleClarify, handleGetState, handleStartQuery, type HttpReply } from "./api/query-handlers.js";
import { createLogger, errorFields } from "./observability/logger.js";

const appConfig = resolveAppConfig();
const logger = createLogger({ level: appConfig.logLevel, bindings: { service: "query-engine" } });
const { engine, close } = createEngineRuntime(appConfig, logger);

const app = express();

app.use(cors());
app.use(express.json());

const send = (res: Response, reply: HttpReply) => res.status(reply.status).json(reply.body);

app.get("/health", (_req: Request, res: Response) => {
  res.json({ status: "ok" });
});

app.post("/query", async (req: Request, res: Response) => {
  send(res, await handleStartQuery(engine, req.body));
});

app.post("/query/:threadId/clarify", async (req: Request<{ threadId: string }>, res: Response) => {
  send(res, await handleClarify(engine, req.params.threadId, req.body));
});

app.get("/query/:threadId", async (req: Request<{ threadId: string }>, res: Response) => {
  send(res, await handleGetState(engine, req.params.threadId, logger));
});

const server = app.listen(appConfig.port, () => {
  logger.info("server listening", { port: appConfig.port });
});

function shutdown(signal: string): void {
  logger.info("shutting down", { signal });
  server.close(() => {
    close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("pool shutdown failed", errorFields(error));
        process.exit(1);
      }
    );
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
