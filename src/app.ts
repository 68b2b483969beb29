import compression from "compression";
import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import pinoHttp from "pino-http";

import { config } from "./config/env";
import { analysisRouter } from "./routes/analysis.route";
import { exportRouter } from "./routes/export.route";
import { AnalysisError, HttpError, httpStatusForAnalysisError } from "./utils/errors";
import { logger } from "./utils/logger";

export const createApp = (opts?: { corsOrigins?: string[] | null }) => {
  const app = express();
  const corsOrigins = opts?.corsOrigins !== undefined ? opts.corsOrigins : config.corsOrigins;

  app.disable("x-powered-by");

  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === "/health"
      }
    })
  );

  app.use(helmet());

  app.use(
    cors({
      origin: (origin, cb) => {
        if (!corsOrigins) return cb(null, true);
        if (!origin) return cb(null, true);
        return cb(null, corsOrigins.includes(origin));
      }
    })
  );

  app.use(compression());
  app.use(express.json({ limit: "5mb" }));

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: 120,
      standardHeaders: true,
      legacyHeaders: false
    })
  );

  app.get("/health", (_req, res) => res.status(200).json({ ok: true }));

  app.use("/api/analysis", analysisRouter);
  app.use("/api/export", exportRouter);

  app.use((_req, _res, next) => {
    next(new HttpError(404, "Not found"));
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = req.id ?? req.header("x-request-id") ?? undefined;

    const known =
      err instanceof HttpError
        ? { status: err.status, message: err.message, details: err.details }
        : err instanceof AnalysisError
          ? { status: httpStatusForAnalysisError(err), message: err.message, details: { code: err.code } }
          : null;

    if (known) {
      if (known.status >= 500) {
        req.log.error({ err, requestId }, "request_error");
      } else {
        req.log.warn({ err, requestId }, "request_error");
      }

      return res.status(known.status).json({
        ok: false,
        error: {
          message: known.message,
          status: known.status,
          details: known.details,
          request_id: requestId
        }
      });
    }

    req.log.error({ err, requestId }, "unhandled_error");

    return res.status(500).json({
      ok: false,
      error: {
        message: "Internal server error",
        status: 500,
        request_id: requestId
      }
    });
  });

  return app;
};
