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

import type { LogFields, Logger, LogLevel } from "./logger.ts";

export type LogEntry = {
  level: LogLevel;
  message: string;
  fields?: LogFields;
};

/**
 * Logger that keeps every entry in memory, for assertions in tests
 */
export const createRecordingLogger = () => {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string, fields?: LogFields) => {
    entries.push({ fields, level, message });
  };
  const logger: Logger = {
    debug: record("debug"),
    error: record("error"),
    info: record("info"),
    trace: record("trace"),
    warn: record("warn"),
  };
  return {
    entries,
    logger,
    messages: (level: LogLevel) =>
      entries.filter((entry) => entry.level === level).map((e) => e.message),
  };
};
