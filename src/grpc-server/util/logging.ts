import { getLogger } from "../../logger.js";

export const logger = getLogger("grpc");
