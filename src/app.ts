import express from "express";
import type { ErrorRequestHandler, Express, RequestHandler } from "express";
import cors from "cors";
import { Logger } from "./utils/logger";
import { createScoreRouter, type ScoreServices } from "./router";
import {
  ClientInputFault,
  INVALID_INPUT_MESSAGE,
  RateLimitFault,
  ServiceFault,
  StoreFault,
} from "./utils/data-helpers";

const logger = new Logger("app");

const CORS_METHODS = ["GET", "POST", "PUT", "DELETE", "OPTIONS"];

const corsOptions: cors.CorsOptions = {
  origin: "*",
  methods: CORS_METHODS,
  allowedHeaders: "*",
  optionsSuccessStatus: 200,
};

//errors raised by express.json() carry a string type such as entity.parse.failed
const isBodyParserError = (
  err: unknown
): err is Error & { type: string; status: number } =>
  err instanceof Error &&
  "type" in err &&
  typeof err.type === "string" &&
  "status" in err &&
  typeof err.status === "number" &&
  err.status < 500;

const toServiceFault = (err: unknown): ServiceFault => {
  if (err instanceof ServiceFault) {
    return err;
  }
  if (isBodyParserError(err)) {
    return new ClientInputFault(INVALID_INPUT_MESSAGE, "text");
  }
  return new ServiceFault("Internal server error", 500, "text");
};

//cors() sends these on preflight only
const allowMethodsAndHeaders: RequestHandler = (_req, res, next) => {
  res.setHeader("Access-Control-Allow-Methods", CORS_METHODS.join(","));
  res.setHeader("Access-Control-Allow-Headers", "*");
  next();
};

const notFound: RequestHandler = (_req, res) => {
  res.status(404).json({ error: "Not found" });
};

const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  const fault = toServiceFault(err);
  if (err instanceof StoreFault) {
    logger.error(`${req.method} ${req.path} store failure`, err.storeError);
  } else if (err instanceof RateLimitFault) {
    logger.info(`rate limited ${err.rollNumber}`);
  } else {
    logger.error(`${req.method} ${req.path} ${fault.status}`, err);
  }

  if (fault.format === "text") {
    res.status(fault.status).type("text/plain").send(fault.message);
    return;
  }
  res.status(fault.status).json({ error: fault.message });
};

export const createApp = (services: ScoreServices): Express => {
  const app = express();

  app.use(cors(corsOptions));
  app.use(allowMethodsAndHeaders);

  const [prefix, router] = createScoreRouter(services);
  app.use(prefix, router);

  app.use(notFound);
  app.use(errorHandler);

  return app;
};
