import express, { type NextFunction, type Request, type Response } from "express";

import { createLogger, errorDetails } from "@/lib/log";

import {
  handleCalculate,
  handleDescribeTariff,
  handleHealth,
  handleListZones,
  handleRefresh,
  handleSearchZones,
  middlewareErrorResult,
  type HandlerDeps,
  type HandlerResult,
} from "./handlers";

const log = createLogger("tariff-server");

function send(res: Response, result: HandlerResult) {
  return res.status(result.status).json(result.body);
}

function requireBearerAuth(token: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!token) return next();
    const header = String(req.headers.authorization ?? "").trim();
    if (header === `Bearer ${token}`) return next();
    res.status(401).json({ ok: false, error: "UNAUTHORIZED" });
  };
}

export function createApp(deps: HandlerDeps, opts: { adminToken: string }) {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "64kb" }));

  app.get("/health", (_req, res) => send(res, handleHealth(deps)));

  app.post("/calculate", (req, res) => {
    const startedAt = Date.now();
    const result = handleCalculate(deps, req.body);
    log.info("calculate", { status: result.status, ms: Date.now() - startedAt });
    return send(res, result);
  });

  app.get("/zones", (req, res) => send(res, handleListZones(deps, req.query.at)));
  app.get("/zones/search", (req, res) => send(res, handleSearchZones(deps, req.query.q)));
  app.get("/zones/:zoneId/tariff", (req, res) => send(res, handleDescribeTariff(deps, req.params.zoneId, req.query.at)));

  app.post("/admin/refresh", requireBearerAuth(opts.adminToken), (_req, res, next) => {
    handleRefresh(deps)
      .then((result) => {
        log.info("refresh", { status: result.status });
        send(res, result);
      })
      .catch(next);
  });

  // Last-resort error handler: keep JSON (also catches express.json parse failures).
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const result = middlewareErrorResult(err);
    log.error("unhandled", { status: result.status, ...errorDetails(err) });
    send(res, result);
  });

  return app;
}
