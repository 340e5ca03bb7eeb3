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

import type { Result } from "ts-results-es";
import { CatalogService } from "../CatalogService.ts";
import type { Logger } from "../_internal/logger.ts";
import type { Config } from "../_internal/types/Config.ts";
import { HttpError } from "../common/HttpError.ts";
import { fromUsernamePassword } from "../credentials/fromUsernamePassword.ts";
import { stripScheme } from "../catalog/s3SourceEntity.ts";
import { loadDatasets, selectDataset } from "../config/loadDatasets.ts";
import { buildPolicyQuery, sqlPath } from "../policy/buildPolicyQuery.ts";
import { waitReady, type Connect } from "../readiness/waitReady.ts";
import type { ProvisioningSettings } from "../settings/settingsFromEnv.ts";

export type ProvisioningDependencies = {
  connect?: Connect;
  fetch?: typeof globalThis.fetch;
  logger?: Logger;
  readConfig?: (path: string) => Promise<string>;
  readJwt?: (path: string) => Promise<string>;
};

export type ProvisioningSummary = {
  dataset: string;
  source: string;
  pathList: string[];
  columns: string[];
  policySql: string;
  viewPath: string[];
  newUser: string;
};

const unwrap = <T>(result: Result<T, unknown>): T => {
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
};

/**
 * Runs the whole provisioning sequence against a fresh catalog service.
 * Each step consumes the output of the previous one, so nothing runs
 * concurrently and the first failure aborts the run.
 */
export const provision = async (
  settings: ProvisioningSettings,
  { connect, fetch, logger, readConfig, readJwt }: ProvisioningDependencies = {},
): Promise<ProvisioningSummary> => {
  await waitReady(settings.catalog.host, settings.catalog.port, {
    ...settings.readiness,
    connect,
    logger,
  });

  const anonymous = CatalogService({
    fetch,
    logger,
    origin: settings.catalog.origin,
  });
  const bootstrap = await anonymous.users.bootstrapFirstUser(settings.admin);
  if (bootstrap.isOk()) {
    logger?.info("register admin user response", { response: bootstrap.value });
  } else if (bootstrap.error instanceof HttpError) {
    // An already bootstrapped catalog answers with a 4xx; the login decides.
    logger?.warn("register admin user refused", {
      detail: bootstrap.error.body.detail,
      status: bootstrap.error.status,
    });
  } else {
    throw bootstrap.error;
  }

  const credentials = fromUsernamePassword(
    settings.admin.username,
    settings.admin.password,
  );
  const config: Config = {
    credentials,
    fetch,
    logger,
    origin: settings.catalog.origin,
  };
  await credentials.get(config);
  logger?.info("logged in", { username: settings.admin.username });
  const { catalog, jobs, users } = CatalogService(config);

  const dataset = selectDataset(
    await loadDatasets(settings.datasetConfigPath, {
      fetch,
      logger,
      readConfig,
      readJwt,
    }),
    settings.datasetName,
  );
  const endpoint = stripScheme(dataset.endpointUrl);

  logger?.info("creating S3 source", { endpoint, source: settings.sourceName });
  const source = unwrap(
    await catalog.createSource({
      credentials: dataset.credentials,
      endpoint,
      name: settings.sourceName,
    }),
  );
  logger?.debug("new source response", { id: source?.id });

  const folder = await catalog.retrieveByPath([
    settings.sourceName,
    ...dataset.path.split("/"),
  ]);
  if (folder.isOk()) {
    logger?.info("data folder path", { path: folder.value.pathString() });
  } else {
    logger?.warn("data folder lookup failed", { error: folder.error });
  }

  const pathList = unwrap(
    await catalog.promote(settings.sourceName, dataset.path, settings.tableFormat),
  );

  const tablePath = sqlPath(pathList);
  const columns = unwrap(await jobs.columnsOf(tablePath, settings.jobPolling));

  const policySql = buildPolicyQuery(
    dataset.transformationColumns,
    tablePath,
    columns,
    logger,
  );
  if (!policySql) {
    logger?.warn("every column is protected, the view has nothing to expose", {
      dataset: dataset.name,
      transformation: dataset.transformation,
    });
  }

  const space = unwrap(await catalog.ensureSpace(settings.spaceName));
  logger?.info("space ready", { space: settings.spaceName, id: space?.id });

  const viewPath = [settings.spaceName, settings.vdsName];
  logger?.info("creating virtual dataset", { path: viewPath.join("/") });
  const view = unwrap(
    await catalog.createView({ path: viewPath, sql: policySql, sqlContext: pathList }),
  );
  logger?.info("create virtual dataset response", { id: view?.id });

  const user = unwrap(await users.create(settings.newUser));
  logger?.debug("created user", { user: user.displayName });

  return {
    columns,
    dataset: dataset.name,
    newUser: user.username ?? settings.newUser.username,
    pathList,
    policySql,
    source: settings.sourceName,
    viewPath,
  };
};
