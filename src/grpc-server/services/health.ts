import type { UntypedServiceImplementation } from "@grpc/grpc-js";
import type { Logger } from "pino";
import { unary } from "../util/call.js";

export interface HealthResponse {
  message: string;
}

export async function health(): Promise<HealthResponse> {
  return { message: "Healthy" };
}

/**
 * Health is a liveness probe and is public unless HEALTH_REQUIRES_AUTH is
 * set; HealthWithAuthentication lets a client check its key end to end.
 * Both are decided by the interceptor, not here.
 */
export function createHealthServiceImpl(log: Logger): UntypedServiceImplementation {
  return {
    Health: unary("HealthService.Health", log, health),
    HealthWithAuthentication: unary("HealthService.HealthWithAuthentication", log, health),
  };
}
