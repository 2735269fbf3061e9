import type { NextFunction, Request, Response } from "express";

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

const MAX_LOGGED_BODY = 200;

/**
 * Logs `METHOD path status in Nms` for /api routes, with a preview of the
 * JSON body that was sent back.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json.bind(res);
  res.json = (bodyJson: unknown) => {
    capturedJsonResponse = bodyJson;
    return originalResJson(bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        const body = JSON.stringify(capturedJsonResponse);
        logLine += ` :: ${body.length > MAX_LOGGED_BODY ? `${body.slice(0, MAX_LOGGED_BODY - 1)}…` : body}`;
      }

      log(logLine);
    }
  });

  next();
}
