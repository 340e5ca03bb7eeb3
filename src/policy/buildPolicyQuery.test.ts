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
import { buildPolicyQuery, sqlPath } from "./buildPolicyQuery.ts";
import { createRecordingLogger } from "../_internal/recordingLogger.ts";

describe("buildPolicyQuery", () => {
  test("drops the protected columns", () => {
    assert.equal(
      buildPolicyQuery(
        ["ssn", "salary"],
        'src"."t',
        ["id", "name", "ssn", "salary"],
      ),
      'SELECT id, name FROM "src"."t',
    );
  });

  test("keeps the table's column order", () => {
    assert.equal(
      buildPolicyQuery(["a"], 'p"', ["c", "a", "b"]),
      'SELECT c, b FROM "p"',
    );
  });

  test("ignores protected columns the table does not have", () => {
    assert.equal(
      buildPolicyQuery(["missing"], 'p"', ["id"]),
      'SELECT id FROM "p"',
    );
  });

  test("returns an empty query when every column is protected", () => {
    const { logger, messages } = createRecordingLogger();
    assert.equal(buildPolicyQuery(["b", "a"], 'p"', ["a", "b"], logger), "");
    assert.deepStrictEqual(messages("debug"), ["empty dataset"]);
  });

  test("returns an empty query for a table without columns", () => {
    assert.equal(buildPolicyQuery([], 'p"', []), "");
  });

  test("closes the quoting of a path built by sqlPath", () => {
    const path = sqlPath(["sample-iceberg", "warehouse", "customers"]);
    assert.equal(path, 'sample-iceberg"."warehouse"."customers"');
    assert.equal(
      buildPolicyQuery(["ssn"], path, ["id", "ssn"]),
      'SELECT id FROM "sample-iceberg"."warehouse"."customers"',
    );
  });
});
