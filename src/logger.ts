// SPDX-License-Identifier: MIT
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Component loggers over secureDevLog. A logger may carry its own minimum
 * level, which its children inherit; otherwise `LoggingConfig.minLevel`
 * applies. Sanitizing and redaction stay in secureDevLog.
 * @module
 */

import {
  isLogLevelEnabled,
  secureDevLog as secureDevelopmentLog,
} from "./utils.ts";
import { environment } from "./environment.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LoggerOptions = {
  /** Per-logger threshold, e.g. a verbose single trial. */
  readonly minLevel?: LogLevel;
};

export type Logger = {
  readonly debug: (message: string, context?: unknown) => void;
  readonly info: (message: string, context?: unknown) => void;
  readonly warn: (message: string, context?: unknown) => void;
  readonly error: (message: string, context?: unknown) => void;
  /** Lets hot paths skip building context that would be dropped. */
  readonly isEnabled: (level: LogLevel) => boolean;
  readonly child: (sub: string) => Logger;
};

export function createLogger(
  component: string,
  options: LoggerOptions = {},
): Logger {
  const { minLevel } = options;
  const isEnabled = (level: LogLevel): boolean =>
    !environment.isProduction && isLogLevelEnabled(level, minLevel);
  const log = (level: LogLevel, message: string, context?: unknown) => {
    if (!isEnabled(level)) return;
    if (minLevel === undefined) {
      secureDevelopmentLog(level, component, message, context);
    } else {
      secureDevelopmentLog(level, component, message, context, { minLevel });
    }
  };
  return {
    debug: (message: string, context?: unknown) =>
      log("debug", message, context),

    info: (message: string, context?: unknown) => log("info", message, context),

    warn: (message: string, context?: unknown) => log("warn", message, context),

    error: (message: string, context?: unknown) =>
      log("error", message, context),

    isEnabled,

    child: (sub: string) => createLogger(`${component}:${sub}`, options),
  };
}
