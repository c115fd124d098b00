import type { handleUnaryCall } from "@grpc/grpc-js";
import type { Logger } from "pino";
import { getCallerId } from "./auth.js";
import { toServiceError } from "./errors.js";

export interface CallContext {
  callerId: string;
  /** Aborted when the client cancels the call. */
  signal: AbortSignal;
  log: Logger;
}

export type UnaryHandler<Res> = (request: unknown, ctx: CallContext) => Promise<Res>;

/**
 * Adapt a promise-returning handler to grpc-js. Requests stay `unknown`
 * until the handler validates them; errors go through toServiceError.
 */
export function unary<Res>(method: string, log: Logger, handler: UnaryHandler<Res>): handleUnaryCall<unknown, Res> {
  return (call, callback) => {
    const controller = new AbortController();
    call.on("cancelled", () => controller.abort());
    const callerId = getCallerId(call.metadata);
    const ctx: CallContext = { callerId, signal: controller.signal, log: log.child({ method, caller: callerId }) };

    handler(call.request, ctx).then(
      (response) => callback(null, response),
      (err: unknown) => {
        if (controller.signal.aborted) {
          ctx.log.info("call cancelled by client");
        }
        callback(toServiceError(err, ctx.log), null);
      },
    );
  };
}
