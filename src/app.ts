import express from "express";
import { errorMessage, logError } from "./log";
import { isAbortError } from "./http/abort";
import { toErrorBody } from "./http/errors";
import { getRequestId, requestContext } from "./http/requestContext";
import { createRoutes, type RouteDeps } from "./http/routes";

export function createApp(deps: RouteDeps): express.Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(requestContext);
  app.use(createRoutes(deps));

  app.use((req: express.Request, res: express.Response) => {
    res.status(404).json({
      error: "Not Found",
      message: "Endpoint không tồn tại",
      path: req.path,
    });
  });

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // If the peer disconnected, don't try to write a response and don't spam logs.
    if (req.aborted || res.headersSent || res.writableEnded || res.destroyed) {
      if (isAbortError(err) || req.aborted || res.destroyed) return;
      if (!res.writableEnded) res.end();
      return;
    }

    logError(`[${getRequestId(req)}]`, "unhandled_error", {
      message: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    return res.status(500).json(toErrorBody("internal_error", "Internal server error"));
  });

  return app;
}
