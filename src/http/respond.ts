import type http from "node:http";
import { finished } from "node:stream/promises";
import { RouteError, ok, type HandlerResult } from "./errors";

export function withSecurityHeaders(headers: Record<string, string>): Record<string, string> {
  return {
    "x-content-type-options": "nosniff",
    "cache-control": "no-store",
    ...headers,
  };
}

/**
 * Writes the error body as plain text and hands the error back for the
 * dispatcher to log. Once headers are out there is nothing left to send.
 */
export function respondErr(res: http.ServerResponse, error: RouteError): HandlerResult {
  if (!res.headersSent) {
    res.writeHead(error.status, withSecurityHeaders({ "content-type": "text/plain; charset=utf-8" }));
    res.end(`${error.message}\n`);
  }
  return { status: error.status, error };
}

export function serializeJson(value: unknown): string {
  const body = JSON.stringify(value);
  if (body === undefined) {
    throw new TypeError("value has no JSON representation");
  }
  return body;
}

/** Resolves once the body is flushed; rejects if the connection goes away first. */
export async function writeBody(
  res: http.ServerResponse,
  status: number,
  headers: Record<string, string>,
  body: string | Buffer
): Promise<void> {
  res.writeHead(status, withSecurityHeaders(headers));
  res.end(body);
  await finished(res);
}

export async function respondJSON(res: http.ServerResponse, value: unknown): Promise<HandlerResult> {
  let body: string;
  try {
    body = serializeJson(value);
  } catch (error) {
    return respondErr(res, new RouteError("serialization_failure", "failed to marshal response", { cause: error }));
  }

  try {
    await writeBody(res, 200, { "content-type": "application/json" }, body);
  } catch (error) {
    return { status: 500, error: new RouteError("write_failure", "failed to write response", { cause: error }) };
  }
  return ok();
}
