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

export const malformedDatasetEntry = (field: string) =>
  ({
    detail: `Missing or invalid field: ${field}`,
    title: "A dataset entry in the configuration is malformed.",
    type: "https://api.catalog-provisioner.dev/problems/config/malformed-dataset-entry",
  }) as const satisfies Problem;

export const malformedTransformations = (detail: string) =>
  ({
    detail,
    title: "The dataset transformations could not be decoded.",
    type: "https://api.catalog-provisioner.dev/problems/config/malformed-transformations",
  }) as const satisfies Problem;

export const datasetNotFound = (name: string | undefined) =>
  ({
    detail: name
      ? `No dataset named ${name} is configured.`
      : "The configuration contains no datasets.",
    title: "The requested dataset is not configured.",
    type: "https://api.catalog-provisioner.dev/problems/config/dataset-not-found",
  }) as const satisfies Problem;
