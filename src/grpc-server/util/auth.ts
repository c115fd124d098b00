import { createHash, timingSafeEqual } from "node:crypto";
import {
  Metadata,
  ResponderBuilder,
  ServerInterceptingCall,
  ServerListenerBuilder,
  type ServerInterceptor,
} from "@grpc/grpc-js";
import type { Logger } from "pino";
import type { ApiKeyEntry } from "../../env.js";
import { ERR } from "./errors.js";

/** Set by the interceptor on authenticated calls; never trusted from clients. */
export const CALLER_METADATA_KEY = "x-caller-id";

export type AuthContext =
  | { readonly status: "authenticated"; readonly callerId: string }
  | { readonly status: "rejected" };

const REJECTED: AuthContext = Object.freeze({ status: "rejected" });

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

function firstString(metadata: Metadata, key: string): string | undefined {
  const [value] = metadata.get(key);
  return typeof value === "string" ? value : undefined;
}

/**
 * Checks a presented key against the allow-list loaded at start-up.
 * Comparison is over fixed-length digests so timing does not depend on how
 * much of the key matched.
 */
export class ApiKeyAuthenticator {
  private readonly entries: ReadonlyArray<{ callerId: string; digest: Buffer }>;

  constructor(keys: readonly ApiKeyEntry[], readonly metadataKey = "api-key") {
    this.entries = keys.filter((k) => k.key.length > 0).map((k) => ({ callerId: k.callerId, digest: digest(k.key) }));
  }

  get size(): number {
    return this.entries.length;
  }

  verify(presented: string | undefined): AuthContext {
    if (!presented) return REJECTED;
    const candidate = digest(presented);
    let callerId: string | undefined;
    for (const entry of this.entries) {
      if (timingSafeEqual(entry.digest, candidate) && callerId === undefined) callerId = entry.callerId;
    }
    return callerId === undefined ? REJECTED : Object.freeze({ status: "authenticated", callerId });
  }

  authenticate(metadata: Metadata): AuthContext {
    return this.verify(firstString(metadata, this.metadataKey));
  }
}

export interface AuthInterceptorOptions {
  authenticator: ApiKeyAuthenticator;
  /** Full method paths (`/pkg.Service/Method`) that skip authentication. */
  publicMethods?: ReadonlySet<string>;
  log?: Logger;
}

/**
 * Server interceptor run before every handler. Unauthenticated calls end
 * with UNAUTHENTICATED before the request message is delivered, so the
 * handler never runs.
 */
export function createAuthInterceptor(opts: AuthInterceptorOptions): ServerInterceptor {
  const { authenticator, publicMethods = new Set<string>(), log } = opts;

  return (methodDescriptor, call) => {
    const listener = new ServerListenerBuilder()
      .withOnReceiveMetadata((metadata, next) => {
        metadata.remove(CALLER_METADATA_KEY);
        if (publicMethods.has(methodDescriptor.path)) {
          next(metadata);
          return;
        }
        const ctx = authenticator.authenticate(metadata);
        if (ctx.status === "rejected") {
          log?.warn({ method: methodDescriptor.path }, "rejected unauthenticated call");
          call.sendStatus(ERR.unauthenticated());
          return;
        }
        metadata.set(CALLER_METADATA_KEY, ctx.callerId);
        next(metadata);
      })
      .build();
    const responder = new ResponderBuilder()
      .withStart((next) => {
        next(listener);
      })
      .build();
    return new ServerInterceptingCall(call, responder);
  };
}

/** Caller attached by the interceptor, or "anonymous" on public methods. */
export function getCallerId(metadata: Metadata): string {
  return firstString(metadata, CALLER_METADATA_KEY) ?? "anonymous";
}
