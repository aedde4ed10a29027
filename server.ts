/**
 * Custom Express server with structured logging.
 * Replaces remix-serve for better log control.
 */

import express from "express";
import type { Request, Response, NextFunction } from "express";
import { createRequestHandler } from "@remix-run/express";
import { log, type LogLevel } from "./app/lib/logger.server";
import { runStartupChecks } from "./app/lib/startup.server";

const app = express();
const PORT = process.env.PORT || 9001;

// Request logging middleware
function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on("finish", () => {
    const duration = Date.now() - start;
    const status = res.statusCode;

    let level: LogLevel = "info";
    if (status >= 500) level = "error";
    else if (status >= 400) level = "warn";

    // Static assets are only interesting when they fail
    if (req.path.startsWith("/assets/") && level === "info") level = "debug";

    const contentLength = res.get("Content-Length");
    const meta: Record<string, unknown> = {
      status,
      ms: duration,
    };
    if (contentLength) meta.bytes = parseInt(contentLength, 10);

    log(level, `${req.method} ${req.path}`, meta);
  });

  next();
}

async function start() {
  // Missing keys stop the server here instead of on the first request
  runStartupChecks();

  // Dynamically import the Remix build (only exists after remix build)
  // eslint-disable-next-line @typescript-eslint/ban-ts-comment
  // @ts-ignore
  // eslint-disable-next-line import/no-unresolved
  const build = await import("./build/server/index.js");

  // Trust proxy for correct IP detection behind reverse proxy
  app.set("trust proxy", true);

  app.use(requestLogger);

  // Serve built client assets (includes /assets directory)
  app.use(
    express.static("build/client", {
      maxAge: "1y",
      immutable: true,
    })
  );

  // Handle all other requests with Remix
  app.all(
    "*",
    createRequestHandler({
      build,
      mode: process.env.NODE_ENV,
    })
  );

  app.listen(PORT, () => {
    log("info", "Server started", { port: PORT, env: process.env.NODE_ENV || "development" });
  });
}

start().catch((err: unknown) => {
  log("error", "Failed to start server", {
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
