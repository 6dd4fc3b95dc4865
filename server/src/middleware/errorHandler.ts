import type { ErrorRequestHandler, RequestHandler } from "express";
import multer from "multer";
import { errorMessage, RelayError } from "@genrelay/shared";

function clientStatus(err: unknown): number | null {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
}

export function notFoundHandler(): RequestHandler {
  return (req, res) => {
    res.status(404).json({ error: "NotFound", message: `No route for ${req.method} ${req.path}` });
  };
}

export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, _req, res, _next) => {
    if (err instanceof RelayError) {
      if (err.statusCode >= 500) console.error("[server error]", err);
      res.status(err.statusCode).json({ error: err.kind, message: err.message });
      return;
    }
    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: "ValidationFailed", message: err.message });
      return;
    }
    // body-parser rejections (malformed JSON, oversize body) carry their own 4xx
    const status = clientStatus(err);
    if (status !== null) {
      res.status(status).json({ error: "ValidationFailed", message: errorMessage(err) });
      return;
    }
    console.error("[server error]", err);
    res.status(500).json({ error: "InternalError", message: errorMessage(err) });
  };
}
