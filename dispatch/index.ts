export * from "./model/types.js";
export * from "./errors.js";
export * from "./config/config.js";
export * from "./engine/index.js";
export * from "./executor/client.js";
export * from "./executor/http/client.js";
export * from "./executor/http/response.js";
export * from "./policy/retry.js";
export * from "./report/report.js";
export * from "./observability/logger.js";
