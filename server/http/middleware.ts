import cors from "cors";
import type { NextFunction, Request, Response } from "express";
import { timingSafeEqual } from "node:crypto";

type Middleware = (request: Request, response: Response, next: NextFunction) => void;

function extractBearerToken(value: string | undefined): string {
  if (!value) {
    return "";
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return "";
  }

  const match = trimmed.match(/^bearer\s+(.+)$/i);
  if (match?.[1]) {
    return match[1].trim();
  }

  return trimmed;
}

export function constantTimeEquals(left: string, right: string): boolean {
  const leftBuffer = Buffer.from(left);
  const rightBuffer = Buffer.from(right);
  if (leftBuffer.length !== rightBuffer.length) {
    return false;
  }

  return timingSafeEqual(leftBuffer, rightBuffer);
}

export function headerValue(request: Pick<Request, "headers">, name: string): string {
  const raw = request.headers[name.toLowerCase()];
  if (typeof raw === "string") {
    return raw.trim();
  }
  if (Array.isArray(raw) && typeof raw[0] === "string") {
    return raw[0].trim();
  }
  return "";
}

export function createSecurityHeadersMiddleware(): Middleware {
  return (_request, response, next) => {
    response.setHeader("X-Content-Type-Options", "nosniff");
    response.setHeader("X-Frame-Options", "DENY");
    response.setHeader("Referrer-Policy", "no-referrer");
    next();
  };
}

export interface CorsConfig {
  allowedOrigins: string[];
  allowAnyOrigin: boolean;
}

export function createCorsMiddleware(config: CorsConfig) {
  return cors({
    origin: (origin, callback) => {
      if (!origin || config.allowAnyOrigin || config.allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      callback(null, false);
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "x-api-token"],
    credentials: false,
    maxAge: 600
  });
}

const auditedHeaders = ["x-github-event", "x-github-delivery", "content-type", "content-length"];

/** Logs every request before anything else touches it, including ones later rejected. */
export function createAuditMiddleware(): Middleware {
  return (request, _response, next) => {
    const headers = auditedHeaders
      .map((name) => {
        const value = headerValue(request, name);
        return value.length > 0 ? `${name}=${value}` : "";
      })
      .filter((entry) => entry.length > 0)
      .join(" ");
    const remote = request.ip ?? request.socket.remoteAddress ?? "unknown";
    const userAgent = headerValue(request, "user-agent") || "-";
    console.info(`[http-audit] ${request.method} ${request.path} from ${remote} ua="${userAgent}"${headers ? ` ${headers}` : ""}`);
    next();
  };
}

export interface InFlightTracker {
  middleware: Middleware;
  count: () => number;
  hasInFlightWork: () => boolean;
}

/** Counts requests that have not finished yet; a restart waits for zero. */
export function createInFlightTracker(): InFlightTracker {
  let inFlight = 0;

  return {
    middleware: (_request, response, next) => {
      inFlight += 1;
      let settled = false;
      const done = () => {
        if (!settled) {
          settled = true;
          inFlight -= 1;
        }
      };
      response.on("finish", done);
      response.on("close", done);
      next();
    },
    count: () => inFlight,
    hasInFlightWork: () => inFlight > 0
  };
}

export interface AuthMiddlewareOptions {
  isProtectedPath: (path: string) => boolean;
}

export function createApiAuthMiddleware(authToken: string, options: AuthMiddlewareOptions): Middleware {
  const trimmedToken = authToken.trim();

  return (request, response, next) => {
    if (request.method === "OPTIONS" || !options.isProtectedPath(request.path)) {
      next();
      return;
    }

    if (trimmedToken.length === 0) {
      next();
      return;
    }

    const bearerToken = extractBearerToken(headerValue(request, "authorization") || undefined);
    const candidate = bearerToken || headerValue(request, "x-api-token");

    if (candidate.length === 0 || !constantTimeEquals(candidate, trimmedToken)) {
      response.status(401).json({ error: "Unauthorized" });
      return;
    }

    next();
  };
}

export function createNotFoundMiddleware(): (request: Request, response: Response) => void {
  return (_request, response) => {
    response.status(404).json({ error: "Not found" });
  };
}

export function createErrorMiddleware(): (
  error: unknown,
  request: Request,
  response: Response,
  next: NextFunction
) => void {
  return (error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    void _request;
    void _next;
    console.error("[unhandled-api-error]", error);
    response.status(500).json({ error: "Internal server error" });
  };
}
