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

import { z } from "zod";
import { malformedTransformations } from "./ConfigErrors.ts";

export type Transformation = {
  readonly name: string;
  readonly columns: readonly string[];
};

const transformationListSchema = z.array(z.unknown()).nonempty();

const namedTransformationSchema = z.object({ name: z.string() }).passthrough();

const columnsSchema = z.object({ columns: z.array(z.string()) });

const fail = (detail: string, cause?: unknown): never => {
  const problem = malformedTransformations(detail);
  throw new Error(problem.title, {
    cause: cause === undefined ? problem : { ...problem, additionalDetails: cause },
  });
};

/**
 * Decodes the base64 encoded JSON array of a dataset's `transformations`
 * field. Only the first transformation is applied: its `name` selects the
 * nested object whose `columns` lists the protected columns.
 *
 * @example
 * // [{"name":"RedactColumn","RedactColumn":{"columns":["ssn"]}}]
 * decodeTransformations(encoded); // { name: "RedactColumn", columns: ["ssn"] }
 */
export const decodeTransformations = (encoded: string): Transformation => {
  const decoded = Buffer.from(encoded, "base64").toString("utf-8");

  let transformations: unknown;
  try {
    transformations = JSON.parse(decoded);
  } catch (e) {
    return fail("transformations are not valid JSON", e);
  }

  const list = transformationListSchema.safeParse(transformations);
  if (!list.success) {
    return fail("expected a non-empty array of transformations");
  }
  const first = namedTransformationSchema.safeParse(list.data[0]);
  if (!first.success) {
    return fail("the first transformation has no name");
  }
  const { name } = first.data;
  const body = columnsSchema.safeParse(first.data[name]);
  if (!body.success) {
    return fail(`transformation ${name} has no columns list`);
  }

  return Object.freeze({
    columns: Object.freeze(body.data.columns),
    name,
  });
};
