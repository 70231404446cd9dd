export {
  createLogger,
  createNoopLogger,
  createRuntimeLogger,
  getLogger,
  setRootLogger,
  wrapLogger,
} from "./logger";
export type { LogLevel, Logger, LoggerConfig, RuntimeLogger } from "./logger";
