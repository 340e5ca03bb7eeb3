/*
 * Copyright (C) 2017-2019 Dremio Corporation
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

export type Logger = Record<
  LogLevel,
  (message: string, fields?: LogFields) => void
>;

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

type LogWriter = (level: LogLevel, line: string) => void;

const consoleWriter: LogWriter = (level, line) => {
  if (level === "warn" || level === "error") {
    console.error(line);
  } else {
    console.info(line);
  }
};

const formatValue = (value: unknown): string => {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  return JSON.stringify(value) ?? String(value);
};

export const formatFields = (fields: LogFields = {}): string =>
  Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(" ");

/**
 * Console logger used by the CLI. Library code only ever sees the `Logger`
 * interface through an optional `logger` option.
 */
export const createLogger = ({
  name,
  level = "info",
  now = () => new Date(),
  write = consoleWriter,
}: {
  name: string;
  level?: LogLevel;
  now?: () => Date;
  write?: LogWriter;
}): Logger => {
  const threshold = LOG_LEVELS.indexOf(level);
  const log =
    (messageLevel: LogLevel) => (message: string, fields?: LogFields) => {
      if (LOG_LEVELS.indexOf(messageLevel) < threshold) {
        return;
      }
      const suffix = formatFields(fields);
      write(
        messageLevel,
        `${now().toISOString()} ${messageLevel.toUpperCase().padEnd(5)} [${name}] ${message}${suffix ? ` ${suffix}` : ""}`,
      );
    };

  return {
    trace: log("trace"),
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
};
