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

import { Err, Ok, type Result } from "ts-results-es";
import type { ResourceConfig, V3Config } from "../_internal/types/Config.ts";
import { getJson, postJson } from "../_internal/jsonRequest.ts";
import { z } from "zod";
import type { Query } from "../common/Query.ts";
import { unexpectedError } from "../common/problems.ts";
import { Job, jobEntityToProperties, type SettleOptions } from "./Job.ts";

const submittedJobSchema = z.object({ id: z.string() });

export const JobsResource = (config: ResourceConfig & V3Config) => {
  const create = (query: Query): Promise<Result<string, unknown>> =>
    postJson(config.v3Request, "sql", {
      context: query.context,
      sql: query.sql,
    })
      .then((response) => {
        const submitted = submittedJobSchema.safeParse(response);
        if (submitted.success) {
          return Ok(submitted.data.id);
        }
        const problem = unexpectedError("The SQL submission returned no job id");
        return Err(new Error(problem.title, { cause: problem }));
      })
      .catch((e: unknown) => Err(e));

  const retrieve = (id: string): Promise<Result<Job, unknown>> =>
    getJson(config.v3Request, `job/${id}`)
      .then((properties) =>
        Ok(new Job(jobEntityToProperties(id, properties), config)),
      )
      .catch((e: unknown) => Err(e));

  return {
    /**
     * Discovers the columns of a table by running an empty select against it.
     * `sqlPath` is the quoted path without its opening quote, e.g.
     * `source"."folder"."table"`.
     */
    columnsOf: async (
      sqlPath: string,
      settleOptions: SettleOptions = {},
    ): Promise<Result<string[], unknown>> => {
      const jobId = await create({ sql: `SELECT * FROM "${sqlPath} LIMIT 0` });
      if (jobId.isErr()) {
        return jobId;
      }
      const job = await retrieve(jobId.value);
      if (job.isErr()) {
        return job;
      }
      try {
        await job.value.settle(settleOptions);
      } catch (e) {
        return Err(e);
      }
      const columns = await job.value.columns();
      if (columns.isOk()) {
        config.logger?.debug("table columns", { columns: columns.value });
      }
      return columns;
    },
    create,
    retrieve,
  };
};
