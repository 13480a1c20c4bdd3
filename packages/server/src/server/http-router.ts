import express, { type ErrorRequestHandler, type Request, type Response, type Router } from "express";
import type pino from "pino";
import { DecodeError, ExchangeError } from "./errors.js";
import type { Exchange } from "./exchange.js";

const STATUS_BY_CODE: Partial<Record<ExchangeError["code"], number>> = {
  negotiation_failed: 400,
  decode_error: 400,
  unknown_connection: 404,
};

type BodyParserError = Error & { type: string; status: number };

// body-parser tags its failures with `type` and an HTTP `status`.
function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    "type" in error &&
    typeof error.type === "string" &&
    "status" in error &&
    typeof error.status === "number"
  );
}

function readConnectionId(req: Request): string {
  const raw = req.query.connectionId;
  if (typeof raw === "string") return raw;
  if (Array.isArray(raw) && typeof raw[0] === "string") return raw[0];
  return "";
}

function sendError(res: Response, logger: pino.Logger, error: unknown): void {
  if (error instanceof ExchangeError) {
    const status = STATUS_BY_CODE[error.code] ?? 400;
    logger.warn({ err: error, status }, "request_rejected");
    res.status(status).json({ error: error.message });
    return;
  }
  logger.error({ err: error }, "request_failed");
  if (!res.headersSent) {
    res.status(500).json({ error: "Internal server error" });
  }
}

/**
 * HTTP surface of an exchange. The trailing path segment picks the
 * operation; any other GET serves the client script. Socket upgrades are
 * handled by `Exchange.attach`, not here.
 */
export function createExchangeRouter(exchange: Exchange, logger: pino.Logger): Router {
  const routerLogger = logger.child({ module: "http-router" });
  const router = express.Router();

  router.use(express.json({ limit: "1mb" }));

  router.post("/negotiate", (req, res) => {
    try {
      res.json(exchange.negotiate(req.body));
    } catch (error) {
      sendError(res, routerLogger, error);
    }
  });

  router.get("/longpoll", async (req, res) => {
    const controller = new AbortController();
    res.on("close", () => controller.abort());
    try {
      const connectionId = readConnectionId(req);
      const payload = await exchange.awaitLongPoll(connectionId, controller.signal);
      if (!res.writableEnded && !controller.signal.aborted) {
        res.json(payload);
        exchange.longPoll.handOff(connectionId);
      }
    } catch (error) {
      sendError(res, routerLogger, error);
    }
  });

  router.post("/call", (req, res) => {
    try {
      exchange.callServer(readConnectionId(req), req.body);
      res.status(202).end();
    } catch (error) {
      sendError(res, routerLogger, error);
    }
  });

  router.get("*", (req, res) => {
    try {
      res.type("application/javascript").send(exchange.clientScript(req.baseUrl || exchange.route));
    } catch (error) {
      sendError(res, routerLogger, error);
    }
  });

  const handleBodyError: ErrorRequestHandler = (error, _req, res, _next) => {
    if (isBodyParserError(error) && error.type === "entity.parse.failed") {
      sendError(res, routerLogger, new DecodeError(`Request body is not valid JSON: ${error.message}`));
      return;
    }
    if (isBodyParserError(error) && error.status >= 400 && error.status < 500) {
      routerLogger.warn({ err: error, status: error.status }, "request_rejected");
      res.status(error.status).json({ error: error.message });
      return;
    }
    sendError(res, routerLogger, error);
  };
  router.use(handleBodyError);

  return router;
}
