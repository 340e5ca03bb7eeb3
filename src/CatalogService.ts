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

import { createRequest } from "./_internal/createRequest.ts";
import type {
  Config,
  ResourceConfig,
  V2Config,
  V3Config,
} from "./_internal/types/Config.ts";
import { CatalogResource } from "./catalog/CatalogResource.ts";
import { JobsResource } from "./jobs/JobsResource.ts";
import { UsersResource } from "./users/UsersResource.ts";

const getResourceConfig = (config: Config) => {
  const request = createRequest(config);
  return {
    logger: config.logger,
    request,
    v2Request: (path, init) => request(`/apiv2/${path}`, init),
    v3Request: (path, init) => request(`/api/v3/${path}`, init),
  } satisfies ResourceConfig & V2Config & V3Config;
};

/**
 * Client for the catalog service's REST API
 */
export const CatalogService = (config: Config) => {
  const resourceConfig = getResourceConfig(config);
  return {
    catalog: CatalogResource(resourceConfig),
    jobs: JobsResource(resourceConfig),
    users: UsersResource(resourceConfig),
  };
};

export type CatalogService = ReturnType<typeof CatalogService>;
