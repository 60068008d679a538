/**
 * JSON-over-HTTP surface for the retrieval service.
 *
 * Endpoints:
 *  - POST /rebuild : full index rebuild   -> { status, entry_count, dimension, elapsed_time }
 *  - POST /query   : { query, k? }        -> { status, query, detected_language, results, elapsed_time }
 *  - POST /answer  : { query, k? }        -> /query payload + { answer }
 *  - GET  /health  : status snapshot (readiness, counters, model)
 *  - GET  /        : browser page (public/index.html) driving the routes above
 *
 * Every failure is answered as { status: "error", code, message } with the
 * HTTP status from `httpStatusFor` (400 bad request, 404 no index, 500 otherwise).
 *
 * Environment (via config): HOST (default 127.0.0.1), PORT (default 5000).
 *
 * Keep this file free of retrieval logic; it is a transport shim.
 */
import express from "express";
import type { Server as HttpServer } from "node:http";
import { fileURLToPath } from "node:url";
import { httpStatusFor } from "../errors";
import type { RagService } from "../service";
import {
  answerPayload,
  errorPayload,
  parseQueryRequest,
  queryPayload,
  rebuildPayload,
} from "../wire";

const PUBLIC_DIR = fileURLToPath(new URL("../../public", import.meta.url));

type AsyncHandler = (req: express.Request, res: express.Response) => Promise<void>;

/** Route rejected promises into express' error middleware. */
const wrap =
  (handler: AsyncHandler): express.RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

/** Build the express application (not yet listening). */
export function createHttpApp(service: RagService): express.Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(express.static(PUBLIC_DIR));

  app.post(
    "/rebuild",
    wrap(async (_req, res) => {
      res.json(rebuildPayload(await service.rebuild()));
    }),
  );

  app.post(
    "/query",
    wrap(async (req, res) => {
      const { query, k } = parseQueryRequest(req.body);
      res.json(queryPayload(await service.query(query, k)));
    }),
  );

  app.post(
    "/answer",
    wrap(async (req, res) => {
      const { query, k } = parseQueryRequest(req.body);
      res.json(answerPayload(await service.answer(query, k)));
    }),
  );

  app.get("/health", (_req, res) => {
    res.json(service.status());
  });

  const onError: express.ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    if (res.headersSent) return;
    // body-parser failures (malformed JSON, oversized body) carry their own 4xx status
    if (err instanceof Error && "status" in err && typeof err.status === "number" && err.status < 500) {
      res.status(err.status).json({ status: "error", code: "INVALID_REQUEST", message: err.message });
      return;
    }
    const status = httpStatusFor(err);
    if (status >= 500) console.error("[RAG] HTTP request failed:", err);
    res.status(status).json(errorPayload(err));
  };
  app.use(onError);

  return app;
}

/**
 * Bind the HTTP app on `host:port`.
 *
 * @returns The listening node server (port 0 picks a free port).
 */
export async function startHttpTransport(
  service: RagService,
  opts: { host: string; port: number },
): Promise<HttpServer> {
  service.markTransport("http");
  const app = createHttpApp(service);
  return new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(opts.port, opts.host, () => {
      console.error(`[RAG] HTTP listening at http://${opts.host}:${opts.port}`);
      resolve(server);
    });
    server.once("error", reject);
  });
}
