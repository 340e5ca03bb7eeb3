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
import { z } from "zod";
import {
  authenticate,
  describeFailure,
  type VaultRequestOptions,
} from "./authenticate.ts";

const authResponseSchema = z.object({
  auth: z.object({ client_token: z.string() }),
});

const secretResponseSchema = z.object({ data: z.record(z.unknown()) });

/**
 * Reads a raw key/value secret from vault on behalf of the given JWT
 */
export const fetchSecret = async (
  jwt: string,
  secretPath: string,
  vaultAddress: string,
  authPath: string,
  role: string,
  options: VaultRequestOptions = {},
): Promise<Option<Record<string, unknown>>> => {
  const { datasetId, logger } = options;
  const fetch = options.fetch ?? globalThis.fetch;

  const authResponse = await authenticate(
    jwt,
    vaultAddress,
    authPath,
    role,
    options,
  );
  if (authResponse.isNone()) {
    logger?.error("empty vault authorization response", { datasetId });
    return None;
  }
  const auth = authResponseSchema.safeParse(authResponse.value);
  if (!auth.success) {
    logger?.error("malformed vault authorization response", { datasetId });
    return None;
  }
  const clientToken = auth.data.auth.client_token;

  const secretFullPath = vaultAddress + secretPath;
  const res = await fetch(secretFullPath, {
    headers: { "X-Vault-Token": clientToken },
  });
  logger?.debug(
    `response received from vault when accessing credentials: ${res.status}`,
    { credentialsPath: secretFullPath, datasetId },
  );
  if (res.status !== 200) {
    logger?.error("error reading credentials from vault", {
      datasetId,
      error: await describeFailure(res),
    });
    return None;
  }

  const secret = secretResponseSchema.safeParse(await res.json());
  if (secret.success) {
    return Some(secret.data.data);
  }
  logger?.error("malformed secret response, expected the 'data' field", {
    datasetId,
  });
  return None;
};
