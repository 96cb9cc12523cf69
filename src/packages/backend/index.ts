export {
  getLogger,
  isLogLevel,
  parseLogLevel,
  setLogFile,
  setLogLevel,
  LOG_LEVELS,
  type LogLevel,
  type Logger,
} from "./logger";
export { ClientUsageSampler, type ClientUsage, type UsageSource } from "./client-usage";
