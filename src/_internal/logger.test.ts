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

import assert from "node:assert/strict";
import test, { describe } from "node:test";
import { createLogger, formatFields, isLogLevel } from "./logger.ts";

const capture = (level: "trace" | "info" = "info") => {
  const lines: string[] = [];
  const logger = createLogger({
    level,
    name: "test",
    now: () => new Date("2026-01-02T03:04:05.000Z"),
    write: (_level, line) => {
      lines.push(line);
    },
  });
  return { lines, logger };
};

describe("createLogger", () => {
  test("writes timestamp, level, name, message and fields", () => {
    const { lines, logger } = capture();
    logger.info("hello", { count: 3, datasetId: "ns/ds" });
    logger.error("failed");
    assert.deepStrictEqual(lines, [
      "2026-01-02T03:04:05.000Z INFO  [test] hello count=3 datasetId=ns/ds",
      "2026-01-02T03:04:05.000Z ERROR [test] failed",
    ]);
  });

  test("drops messages below the configured level", () => {
    const { lines, logger } = capture("info");
    logger.trace("noise");
    logger.debug("noise");
    logger.warn("kept");
    assert.deepStrictEqual(lines, [
      "2026-01-02T03:04:05.000Z WARN  [test] kept",
    ]);
  });

  test("keeps everything at trace", () => {
    const { lines, logger } = capture("trace");
    logger.trace("first");
    logger.debug("second");
    assert.equal(lines.length, 2);
  });
});

describe("formatFields", () => {
  test("quotes values containing whitespace", () => {
    assert.equal(
      formatFields({ error: "403: denied" }),
      'error="403: denied"',
    );
  });

  test("serializes arrays and skips undefined values", () => {
    assert.equal(
      formatFields({ columns: ["id", "name"], missing: undefined }),
      'columns=["id","name"]',
    );
  });
});

test("isLogLevel", () => {
  assert.equal(isLogLevel("debug"), true);
  assert.equal(isLogLevel("verbose"), false);
});
