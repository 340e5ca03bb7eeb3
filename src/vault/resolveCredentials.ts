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

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { fetchSecret } from "./fetchSecret.ts";
import type { VaultRequestOptions } from "./authenticate.ts";
import { missingVaultCredentials } from "./VaultErrors.ts";

/**
 * Vault settings of a dataset's S3 connection. Field names follow the
 * dataset configuration document.
 */
export type VaultCredentialsConfig = {
  jwt_file_path?: string;
  address?: string;
  secretPath?: string;
  authPath?: string;
  role?: string;
};

export const VAULT_DEFAULTS = {
  address: "https://localhost:8200",
  authPath: "/v1/auth/kubernetes/login",
  jwt_file_path: "/var/run/secrets/kubernetes.io/serviceaccount/token",
  role: "demo",
  secretPath: "/v1/secret/data/cred",
} as const satisfies Required<VaultCredentialsConfig>;

export type CredentialPair = {
  readonly accessKey: string;
  readonly secretKey: string;
};

export type ResolveCredentialsOptions = Omit<
  VaultRequestOptions,
  "datasetId"
> & {
  readJwt?: (path: string) => Promise<string>;
};

export const readJwtFromFile = (path: string): Promise<string> =>
  readFile(path, "utf-8");

const credentialPairSchema = z.object({
  access_key: z.string(),
  secret_key: z.string(),
});

const missingCredentials = () =>
  new Error(missingVaultCredentials.title, { cause: missingVaultCredentials });

export const resolveCredentials = async (
  vaultCredentials: VaultCredentialsConfig,
  datasetId: string,
  { readJwt = readJwtFromFile, ...options }: ResolveCredentialsOptions = {},
): Promise<CredentialPair> => {
  const { logger } = options;
  const settings = { ...VAULT_DEFAULTS, ...vaultCredentials };
  const jwt = await readJwt(settings.jwt_file_path);

  const credentials = await fetchSecret(
    jwt,
    settings.secretPath,
    settings.address,
    settings.authPath,
    settings.role,
    { ...options, datasetId },
  );
  if (credentials.isNone()) {
    throw missingCredentials();
  }

  const secret = credentialPairSchema.safeParse(credentials.value);
  if (secret.success) {
    const { access_key, secret_key } = secret.data;
    if (access_key && secret_key) {
      return { accessKey: access_key, secretKey: secret_key };
    }
    if (!access_key) {
      logger?.error("'access_key' must be non-empty", { datasetId });
    }
    if (!secret_key) {
      logger?.error("'secret_key' must be non-empty", { datasetId });
    }
  }
  logger?.error(
    "expected both 'access_key' and 'secret_key' fields in vault secret",
    { datasetId },
  );
  throw missingCredentials();
};
