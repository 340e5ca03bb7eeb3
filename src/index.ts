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

export { CatalogService } from "./CatalogService.ts";
export { createRequest, networkError } from "./_internal/createRequest.ts";
export type { Config, RequestFn } from "./_internal/types/Config.ts";
export {
  createLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from "./_internal/logger.ts";
export * from "./common/Problem.ts";
export * from "./common/Query.ts";
export { HttpError } from "./common/HttpError.ts";
export { authHeaders, type AuthHeaders } from "./credentials/authHeaders.ts";
export type { CredentialProvider } from "./credentials/CredentialProvider.ts";
export {
  fromUsernamePassword,
  login,
} from "./credentials/fromUsernamePassword.ts";
export { authenticate } from "./vault/authenticate.ts";
export { fetchSecret } from "./vault/fetchSecret.ts";
export {
  resolveCredentials,
  type CredentialPair,
  type VaultCredentialsConfig,
} from "./vault/resolveCredentials.ts";
export { missingVaultCredentials } from "./vault/VaultErrors.ts";
export { loadDatasets, selectDataset } from "./config/loadDatasets.ts";
export {
  parseDatasets,
  type DatasetDescriptor,
} from "./config/parseDatasets.ts";
export { decodeTransformations } from "./config/decodeTransformations.ts";
export { CatalogReference } from "./catalog/CatalogReference.ts";
export { Job, type JobState } from "./jobs/Job.ts";
export { User } from "./users/User.ts";
export { buildPolicyQuery, sqlPath } from "./policy/buildPolicyQuery.ts";
export { waitReady, tcpConnect } from "./readiness/waitReady.ts";
export {
  provision,
  type ProvisioningSummary,
} from "./provisioning/provision.ts";
export {
  settingsFromEnv,
  type ProvisioningSettings,
} from "./settings/settingsFromEnv.ts";
