import { type ILogger, LogLevel } from "../../../shared/logger.js";
import ConsoleLogger from "../../shared/logger/console-logger.js";

/**
 * デバッグモードを有効にする環境変数の名前です。
 */
const DEBUG_ENV_KEYS = ["DEBUG", "RUNNER_DEBUG", "ACTIONS_RUNNER_DEBUG", "ACTIONS_STEP_DEBUG"];

function isDebugMode(): boolean {
  return DEBUG_ENV_KEYS.some(k => {
    const value = process.env[k]?.toLowerCase();
    return value === "1" || value === "true";
  });
}

export default function getLogger(logger: ILogger | undefined): ILogger {
  if (logger !== undefined) {
    return logger;
  } else if (isDebugMode()) {
    return new ConsoleLogger(LogLevel.DEBUG);
  } else {
    return new ConsoleLogger(LogLevel.WARN);
  }
}
