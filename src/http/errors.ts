export type RouteErrorKind =
  | "configuration_invalid"
  | "unauthenticated"
  | "method_not_allowed"
  | "not_found"
  | "upstream_query_failed"
  | "internal_resource_failure"
  | "serialization_failure"
  | "write_failure";

const STATUS_BY_KIND: Record<RouteErrorKind, number> = {
  configuration_invalid: 501,
  unauthenticated: 401,
  method_not_allowed: 405,
  not_found: 404,
  upstream_query_failed: 500,
  internal_resource_failure: 500,
  serialization_failure: 500,
  write_failure: 500,
};

/** The message is what the caller sees; `cause` stays in the logs. */
export class RouteError extends Error {
  readonly kind: RouteErrorKind;
  readonly status: number;

  constructor(kind: RouteErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RouteError";
    this.kind = kind;
    this.status = STATUS_BY_KIND[kind];
  }
}

export type HandlerResult = {
  status: number;
  error: RouteError | null;
};

export function ok(status = 200): HandlerResult {
  return { status, error: null };
}

export function describeCause(error: RouteError): string | null {
  const { cause } = error;
  if (cause === undefined) return null;
  return cause instanceof Error ? cause.message : String(cause);
}
