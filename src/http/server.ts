import http from "node:http";
import crypto from "node:crypto";
import type { Logger } from "../config/logger";
import type { Authorizer } from "../authz/authorization";
import type { BundleProvider } from "../assets/bundle";
import type { DirectoryService } from "../directory/interfaces";
import { validateConfiguration, type ConfigurationProvider } from "../settings/configuration";
import { RouteError, describeCause, type HandlerResult } from "./errors";
import { respondErr } from "./respond";
import { createRouteTable } from "./handlers";

export const NOT_CONFIGURED_MESSAGE = "This plugin is not configured";
export const DEFAULT_IDENTITY_HEADER = "x-user-id";

export type DispatcherDependencies = {
  logger: Logger;
  configuration: ConfigurationProvider;
  directory: DirectoryService;
  authorizer: Authorizer;
  bundle: BundleProvider;
  identityHeader?: string;
};

export type RequestListener = (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void>;

function firstHeader(value: string | string[] | undefined): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value[0]) return value[0];
  return undefined;
}

const ABSOLUTE_FORM_PREFIX = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/i;

/**
 * Path and query of a request target. Absolute-form targets (sent through
 * proxies) lose their scheme and authority; the path is decoded but never
 * normalized, so `/a/../b` and trailing slashes reach the route table as sent.
 */
export function splitRequestTarget(target: string): { path: string; query: URLSearchParams } {
  const originForm = target.replace(ABSOLUTE_FORM_PREFIX, "");
  const queryStart = originForm.indexOf("?");
  const rawPath = queryStart === -1 ? originForm : originForm.slice(0, queryStart);
  const rawQuery = queryStart === -1 ? "" : originForm.slice(queryStart + 1);
  return { path: decodePath(rawPath || "/"), query: new URLSearchParams(rawQuery) };
}

// Malformed escapes fall back to the raw path.
function decodePath(rawPath: string): string {
  try {
    return decodeURIComponent(rawPath);
  } catch {
    return rawPath;
  }
}

/** Query string with keys in sorted order, for stable log lines. */
export function encodeQueryForLog(query: URLSearchParams): string {
  const sorted = new URLSearchParams(query);
  sorted.sort();
  return sorted.toString();
}

/**
 * Entry point for every request: configuration gate, exact-path lookup,
 * one handler. Handlers write their own response; failures they report are
 * logged here with the request context.
 */
export function createDispatcher(deps: DispatcherDependencies): RequestListener {
  const { logger, configuration } = deps;
  const identityHeader = (deps.identityHeader ?? DEFAULT_IDENTITY_HEADER).toLowerCase();
  const routes = createRouteTable(deps);

  const serve = async (
    req: http.IncomingMessage,
    res: http.ServerResponse,
    method: string,
    path: string
  ): Promise<HandlerResult> => {
    const check = validateConfiguration(configuration.current());
    if (!check.ok) {
      return respondErr(res, new RouteError("configuration_invalid", NOT_CONFIGURED_MESSAGE, { cause: check.error }));
    }

    const handler = routes.get(path);
    if (!handler) {
      return respondErr(res, new RouteError("not_found", "not found"));
    }

    return handler({
      req,
      res,
      method,
      userId: firstHeader(req.headers[identityHeader]) ?? "",
      configuration: check.configuration,
    });
  };

  return async (req, res) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    const method = req.method ?? "GET";
    const requestUri = req.url ?? "/";
    const { path, query } = splitRequestTarget(requestUri);

    let result: HandlerResult;
    try {
      result = await serve(req, res, method, path);
    } catch (error) {
      result = respondErr(res, new RouteError("internal_resource_failure", "internal error", { cause: error }));
    }

    if (result.error) {
      logger.error("switchboard_http_request_failed", {
        requestId,
        status: result.status,
        kind: result.error.kind,
        error: result.error.message,
        cause: describeCause(result.error),
        host: req.headers.host ?? "",
        requestUri,
        method,
        query: encodeQueryForLog(query),
      });
    }
    logger.debug("switchboard_http_request", {
      requestId,
      method,
      path,
      statusCode: result.status,
      durationMs: Date.now() - startedAt,
    });
  };
}

export function startHttpServer(params: DispatcherDependencies & { host: string; port: number }): http.Server {
  const { host, port, logger } = params;
  const dispatch = createDispatcher(params);

  const server = http.createServer((req, res) => {
    void dispatch(req, res);
  });

  server.listen(port, host, () => {
    logger.info("switchboard_http_listening", { host, port });
  });

  return server;
}
