// backend/services/shared/src/index.ts

export * from "./routing";

export {
  getLogger,
  initLogger,
  setLogLevel,
  currentServiceName,
  type IBoundLogger,
  type LogLevel,
} from "./logger/Logger";
export { ServiceBase } from "./base/ServiceBase";
export { EnvLoader, type EnvMode } from "./env/EnvLoader";
export {
  parseServiceConfig,
  ServiceConfigError,
  type ServiceConfig,
} from "./contracts/serviceConfig.contract";
export { ProblemFactory, zProblem, type ProblemJson } from "./problem/problem";
export {
  createProblemMiddleware,
  createNotFoundMiddleware,
} from "./problem/createProblemMiddleware";
export { createDispatchMiddleware, toResourceRequest } from "./http/dispatch";
export { createServiceApp, type CreateServiceAppOptions } from "./app/createServiceApp";
export { startHttpService, type StartedService } from "./bootstrap/startHttpService";
