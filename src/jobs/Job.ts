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

import {
  concatMap,
  lastValueFrom,
  repeat,
  takeWhile,
  tap,
  timer,
} from "rxjs";
import { Err, Ok, type Result } from "ts-results-es";
import type { ResourceConfig, V3Config } from "../_internal/types/Config.ts";
import { getJson } from "../_internal/jsonRequest.ts";
import { z } from "zod";
import { optionalText } from "../_internal/schemas.ts";
import { unexpectedError } from "../common/problems.ts";
import { jobFailed, jobTimeout } from "./JobErrors.ts";

const JOB_STATES = [
  "NOT_SUBMITTED",
  "STARTING",
  "RUNNING",
  "COMPLETED",
  "CANCELED",
  "FAILED",
  "CANCELLATION_REQUESTED",
  "PLANNING",
  "PENDING",
  "METADATA_RETRIEVAL",
  "QUEUED",
  "ENGINE_START",
  "EXECUTION_PLANNING",
  "INVALID_STATE",
] as const;

export type JobState = (typeof JOB_STATES)[number];

const jobEntitySchema = z.object({
  endedAt: optionalText,
  errorMessage: optionalText,
  jobState: z.enum(JOB_STATES),
  rowCount: z.number().nullable().catch(null),
  startedAt: optionalText,
});

const jobResultsSchema = z.object({
  schema: z.array(z.object({ name: optionalText }).catch({ name: null })),
});

export type SettleOptions = {
  /**
   * Delay between two status polls
   */
  intervalMs?: number;
  maxAttempts?: number;
};

export const DEFAULT_JOB_POLL_INTERVAL_MS = 10_000;
export const DEFAULT_JOB_MAX_ATTEMPTS = 60;

export class Job {
  readonly endedAt: JobProperties["endedAt"];
  readonly errorMessage: JobProperties["errorMessage"];
  readonly id: JobProperties["id"];
  readonly rowCount: JobProperties["rowCount"];
  readonly startedAt: JobProperties["startedAt"];
  readonly state: JobProperties["state"];

  #config: ResourceConfig & V3Config;

  constructor(properties: JobProperties, config: ResourceConfig & V3Config) {
    this.endedAt = properties.endedAt;
    this.errorMessage = properties.errorMessage;
    this.id = properties.id;
    this.rowCount = properties.rowCount;
    this.startedAt = properties.startedAt;
    this.state = properties.state;
    this.#config = config;
  }

  get settled() {
    return (
      this.state === "COMPLETED" ||
      this.state === "FAILED" ||
      this.state === "INVALID_STATE" ||
      this.state === "CANCELED"
    );
  }

  #refresh() {
    return getJson(this.#config.v3Request, `job/${this.id}`).then(
      (entity) => new Job(jobEntityToProperties(this.id, entity), this.#config),
    );
  }

  /**
   * Polls the job until it settles. Rejects once `maxAttempts` polls have
   * been spent, or when the job settles in any state but `COMPLETED`.
   */
  async settle({
    intervalMs = DEFAULT_JOB_POLL_INTERVAL_MS,
    maxAttempts = DEFAULT_JOB_MAX_ATTEMPTS,
  }: SettleOptions = {}): Promise<Job> {
    const job = this.settled
      ? this
      : await lastValueFrom(
          timer(intervalMs).pipe(
            concatMap(() => this.#refresh()),
            repeat(maxAttempts),
            tap((polled) =>
              this.#config.logger?.info("waiting for job", {
                jobId: this.id,
                state: polled.state,
              }),
            ),
            takeWhile((polled) => !polled.settled, true),
          ),
          { defaultValue: this },
        );

    if (!job.settled) {
      const problem = jobTimeout(this.id, maxAttempts);
      throw new Error(problem.title, { cause: problem });
    }
    if (job.state !== "COMPLETED") {
      const problem = jobFailed(this.id, job.state, job.errorMessage);
      throw new Error(problem.title, { cause: problem });
    }
    return job;
  }

  /**
   * Column names of the job's result schema
   */
  columns(): Promise<Result<string[], unknown>> {
    return getJson(this.#config.v3Request, `job/${this.id}/results`)
      .then((response) => {
        const results = jobResultsSchema.safeParse(response);
        if (!results.success) {
          const problem = unexpectedError(`Job ${this.id} results have no schema`);
          return Err(new Error(problem.title, { cause: problem }));
        }
        return Ok(
          results.data.schema.flatMap(({ name }) => (name === null ? [] : [name])),
        );
      })
      .catch((e: unknown) => Err(e));
  }
}

export const jobEntityToProperties = (id: string, entity: unknown) => {
  const parsed = jobEntitySchema.safeParse(entity);
  if (!parsed.success) {
    const problem = unexpectedError(
      `Job ${id} has an unrecognized status: ${JSON.stringify(entity)}`,
    );
    throw new Error(problem.title, { cause: problem });
  }
  const { endedAt, errorMessage, jobState, rowCount, startedAt } = parsed.data;
  return {
    endedAt: endedAt ? new Date(endedAt) : null,
    errorMessage,
    id,
    rowCount,
    startedAt: startedAt ? new Date(startedAt) : null,
    state: jobState,
  } as const;
};

type JobProperties = ReturnType<typeof jobEntityToProperties>;
