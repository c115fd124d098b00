import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const ROOT_DIR = path.resolve(__dirname, "../..");
export const PROTO_DIR = path.join(ROOT_DIR, "proto");

export const PROTO_FILES = [
  path.join(PROTO_DIR, "health/v1/health.proto"),
  path.join(PROTO_DIR, "ai/v1/ai.proto"),
];

export const SERVICE_NAMES = {
  health: "health.v1.HealthService",
  ai: "ai.v1.AiService",
} as const;

/** Parsed definitions; kept around so reflection can describe the same files. */
export function loadDefinition(paths: string[] = PROTO_FILES): Promise<protoLoader.PackageDefinition> {
  return protoLoader.load(paths, {
    keepCase: false,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
    includeDirs: [PROTO_DIR],
  });
}

export async function loadProto(paths: string[] = PROTO_FILES): Promise<grpc.GrpcObject> {
  return grpc.loadPackageDefinition(await loadDefinition(paths));
}

/** Resolve `pkg.sub.Service` inside a loaded package to its client constructor. */
export function lookupService(root: grpc.GrpcObject, fullName: string): grpc.ServiceClientConstructor {
  const segments = fullName.split(".");
  const serviceName = segments.pop() ?? "";
  let node: grpc.GrpcObject = root;
  for (const segment of segments) {
    const next = node[segment];
    if (!next || typeof next === "function" || "format" in next) {
      throw new Error(`Failed to load protobuf package ${segment} of ${fullName}. Check proto paths.`);
    }
    node = next;
  }
  const ctor = node[serviceName];
  if (typeof ctor !== "function") {
    throw new Error(`Failed to load protobuf service ${fullName}. Check proto paths.`);
  }
  return ctor;
}

/** Full method path as seen by interceptors, e.g. `/health.v1.HealthService/Health`. */
export function methodPath(serviceName: string, method: string): string {
  return `/${serviceName}/${method}`;
}
