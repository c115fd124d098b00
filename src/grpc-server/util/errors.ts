import { status, type ServerErrorResponse } from "@grpc/grpc-js";
import type { Logger } from "pino";
import { GatewayError, ProviderError, type ErrorKind } from "../../errors.js";

export const STATUS_BY_KIND: Record<ErrorKind, status> = {
  Unauthenticated: status.UNAUTHENTICATED,
  InvalidArgument: status.INVALID_ARGUMENT,
  ProviderUnavailable: status.UNAVAILABLE,
  ProviderTimeout: status.DEADLINE_EXCEEDED,
  ProviderInvalidResponse: status.INTERNAL,
  Cancelled: status.CANCELLED,
  Internal: status.INTERNAL,
};

export type StatusError = ServerErrorResponse & { code: status; details: string };

function make(code: status, details: string): StatusError {
  return Object.assign(new Error(details), { code, details });
}

export const ERR = {
  unauthenticated: (msg = "Invalid API key") => make(status.UNAUTHENTICATED, msg),
  internal: (msg = "internal error") => make(status.INTERNAL, `Internal: ${msg}`),
};

/**
 * Map anything a handler threw to a status error. Known kinds keep their
 * message; anything else is logged and reported as a bare Internal.
 */
export function toServiceError(err: unknown, log?: Logger): StatusError {
  if (err instanceof GatewayError || err instanceof ProviderError) {
    return make(STATUS_BY_KIND[err.kind], `${err.kind}: ${err.message}`);
  }
  log?.error({ err }, "unhandled handler error");
  return ERR.internal();
}
