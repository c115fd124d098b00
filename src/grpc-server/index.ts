import * as grpc from "@grpc/grpc-js";
import { ReflectionService } from "@grpc/reflection";
import { HealthImplementation } from "grpc-health-check";
import type { Logger } from "pino";
import type { Capabilities } from "../ai/types.js";
import type { AppConfig } from "../env.js";
import { createAiServiceImpl } from "./services/ai.js";
import { createHealthServiceImpl } from "./services/health.js";
import { ApiKeyAuthenticator, createAuthInterceptor } from "./util/auth.js";
import { logger as grpcLogger } from "./util/logging.js";
import { loadDefinition, lookupService, methodPath, SERVICE_NAMES } from "./proto.js";

const ServingStatus = {
  SERVING: "SERVING" as const,
  NOT_SERVING: "NOT_SERVING" as const,
};

const STANDARD_HEALTH_SERVICE = "grpc.health.v1.Health";
const REFLECTION_SERVICES = ["grpc.reflection.v1.ServerReflection", "grpc.reflection.v1alpha.ServerReflection"];

/** Services reported by the standard health service. */
const HEALTH_CHECKED = ["", SERVICE_NAMES.ai];

export interface ServerDeps {
  config: Pick<AppConfig, "auth" | "batch" | "grpc">;
  capabilities: Capabilities;
  log?: Logger;
}

export interface PublicMethodOptions {
  healthRequiresAuth: boolean;
  reflection: boolean;
}

/**
 * Methods that skip the api-key check: the liveness probes unless
 * HEALTH_REQUIRES_AUTH is set, and server reflection while it is enabled.
 */
export function publicMethods(opts: PublicMethodOptions): Set<string> {
  const methods = new Set<string>();
  if (!opts.healthRequiresAuth) {
    methods.add(methodPath(SERVICE_NAMES.health, "Health"));
    methods.add(methodPath(STANDARD_HEALTH_SERVICE, "Check"));
    methods.add(methodPath(STANDARD_HEALTH_SERVICE, "Watch"));
  }
  if (opts.reflection) {
    for (const service of REFLECTION_SERVICES) methods.add(methodPath(service, "ServerReflectionInfo"));
  }
  return methods;
}

export interface GatewayServer {
  server: grpc.Server;
  health: HealthImplementation;
}

export async function createGatewayServer(deps: ServerDeps): Promise<GatewayServer> {
  const log = deps.log ?? grpcLogger;
  const { auth, batch, grpc: grpcCfg } = deps.config;

  const authenticator = new ApiKeyAuthenticator(auth.apiKeys, auth.metadataKey);
  if (authenticator.size === 0) {
    log.warn("no API keys configured; every authenticated method will be rejected");
  }

  const server = new grpc.Server({
    interceptors: [
      createAuthInterceptor({
        authenticator,
        publicMethods: publicMethods({ healthRequiresAuth: auth.healthRequiresAuth, reflection: grpcCfg.reflection }),
        log,
      }),
    ],
    "grpc.max_receive_message_length": grpcCfg.maxMessageBytes,
  });

  const definition = await loadDefinition();
  const protos = grpc.loadPackageDefinition(definition);

  // Register standard health alongside the gateway's own HealthService
  const health = new HealthImplementation({
    "": ServingStatus.SERVING,
    [SERVICE_NAMES.ai]: ServingStatus.SERVING,
  });
  health.addToServer(server);

  if (grpcCfg.reflection) {
    new ReflectionService(definition).addToServer(server);
  }

  server.addService(lookupService(protos, SERVICE_NAMES.health).service, createHealthServiceImpl(log));
  server.addService(
    lookupService(protos, SERVICE_NAMES.ai).service,
    createAiServiceImpl({ capabilities: deps.capabilities, batch }, log),
  );

  return { server, health };
}

export function bindServer(server: grpc.Server, address: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(address, grpc.ServerCredentials.createInsecure(), (err: Error | null, boundPort: number) => {
      if (err) reject(err);
      else resolve(boundPort);
    });
  });
}

/** Report the server and AiService as NOT_SERVING so load balancers drain it. */
export function markNotServing(health: Pick<HealthImplementation, "setStatus">): void {
  for (const service of HEALTH_CHECKED) health.setStatus(service, ServingStatus.NOT_SERVING);
}

/** Stop accepting calls and let in-flight ones finish, up to `graceMs`. */
export function shutdownServer(gateway: GatewayServer, graceMs: number): Promise<void> {
  markNotServing(gateway.health);
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      gateway.server.forceShutdown();
      resolve();
    }, graceMs);
    gateway.server.tryShutdown(() => {
      clearTimeout(timer);
      resolve();
    });
  });
}
