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

export type ValidationProblem = {
  detail: string;
  pointer: string;
};

/**
 * An RFC 7807 style description of a failure. Domain errors are thrown as
 * `new Error(problem.title, { cause: problem })`.
 */
export type Problem = {
  type: string;
  title: string;
  detail?: string;
  errors?: ValidationProblem[];
};

export const isProblem = (value: unknown): value is Problem =>
  typeof value === "object" &&
  value !== null &&
  "type" in value &&
  typeof value.type === "string" &&
  "title" in value &&
  typeof value.title === "string";

/**
 * Returns the problem attached as the `cause` of an error, if any
 */
export const problemOf = (err: unknown): Problem | null => {
  if (err instanceof Error && isProblem(err.cause)) {
    return err.cause;
  }
  if (isProblem(err)) {
    return err;
  }
  return null;
};

export const hasProblemType = (err: unknown, type: string): boolean =>
  problemOf(err)?.type === type;
