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

import type { Logger } from "../_internal/logger.ts";

/**
 * Quotes each path segment for use after an opening `"`:
 * `["src", "a", "t"]` becomes `src"."a"."t"`.
 */
export const sqlPath = (pathList: readonly string[]): string =>
  pathList.join('"."') + '"';

/**
 * Projects every column that is not protected by the transformation.
 * Returns an empty string when no column is left to expose.
 */
export const buildPolicyQuery = (
  protectedColumns: readonly string[],
  fullyQualifiedPath: string,
  allColumns: readonly string[],
  logger?: Logger,
): string => {
  const excluded = new Set(protectedColumns);
  const allowed = allColumns.filter((column) => !excluded.has(column));
  if (allowed.length < 1) {
    logger?.debug("empty dataset", { path: fullyQualifiedPath });
    return "";
  }
  // the path carries its own closing quote
  const sql = `SELECT ${allowed.join(", ")} FROM "${fullyQualifiedPath}`;
  logger?.debug("SQL to build the virtual dataset", { sql });
  return sql;
};
