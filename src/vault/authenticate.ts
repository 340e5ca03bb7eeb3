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

import { None, Some, type Option } from "ts-results-es";
import type { Logger } from "../_internal/logger.ts";

export type VaultRequestOptions = {
  datasetId?: string;
  fetch?: typeof globalThis.fetch;
  logger?: Logger;
};

export const describeFailure = async (res: Response) =>
  `${res.status}: ${await res.text()}`;

/**
 * Exchanges a JWT (typically a service account token) for a vault session.
 * Any status other than 200 is logged and reported as `None`.
 */
export const authenticate = async (
  jwt: string,
  vaultAddress: string,
  authPath: string,
  role: string,
  { datasetId, fetch = globalThis.fetch, logger }: VaultRequestOptions = {},
): Promise<Option<unknown>> => {
  const fullAuthPath = vaultAddress + authPath;
  logger?.trace("authenticating against vault using a JWT token", {
    datasetId,
    fullAuthPath,
  });
  const res = await fetch(fullAuthPath, {
    body: JSON.stringify({ jwt, role }),
    headers: { "Content-Type": "application/json" },
    method: "POST",
  });
  if (res.status === 200) {
    return Some(await res.json());
  }
  logger?.error("vault authentication failed", {
    datasetId,
    error: await describeFailure(res),
  });
  return None;
};
