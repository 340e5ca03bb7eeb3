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

import type { Problem } from "../common/Problem.ts";

export const JOB_TIMEOUT =
  "https://api.catalog-provisioner.dev/problems/jobs/timeout";

export const JOB_FAILED =
  "https://api.catalog-provisioner.dev/problems/jobs/failed";

export const jobTimeout = (id: string, attempts: number) =>
  ({
    detail: `Job ${id} did not settle after ${attempts} polls.`,
    title: "The job did not complete in time.",
    type: JOB_TIMEOUT,
  }) as const satisfies Problem;

export const jobFailed = (id: string, state: string, errorMessage: string | null) =>
  ({
    detail: errorMessage
      ? `Job ${id} ended in state ${state}: ${errorMessage}`
      : `Job ${id} ended in state ${state}`,
    title: "The job did not complete successfully.",
    type: JOB_FAILED,
  }) as const satisfies Problem;
