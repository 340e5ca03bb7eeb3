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

import type { CredentialProvider } from "../../credentials/CredentialProvider.ts";
import type { Logger } from "../logger.ts";

export type Config = {
  /**
   * Base URL of the catalog service, e.g. `http://localhost:9047`
   */
  origin: string | URL;
  credentials?: CredentialProvider;
  fetch?: typeof globalThis.fetch;
  logger?: Logger;
};

export type RequestInitWithHeaders = Omit<RequestInit, "headers"> & {
  headers?: Record<string, string>;
};

export type RequestFn = (
  path: string,
  init?: RequestInitWithHeaders,
) => Promise<Response>;

export type ResourceConfig = {
  logger?: Logger;
  request: RequestFn;
};

export type V2Config = {
  v2Request: RequestFn;
};

export type V3Config = {
  v3Request: RequestFn;
};
