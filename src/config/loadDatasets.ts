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
import {
  resolveCredentials,
  type ResolveCredentialsOptions,
} from "../vault/resolveCredentials.ts";
import { datasetNotFound } from "./ConfigErrors.ts";
import { parseDatasets, type DatasetDescriptor } from "./parseDatasets.ts";

export const DEFAULT_DATASET_CONFIG_PATH = "/etc/conf/conf.yaml";

export const loadDatasets = async (
  path: string = DEFAULT_DATASET_CONFIG_PATH,
  {
    readConfig = (file: string) => readFile(file, "utf-8"),
    ...options
  }: ResolveCredentialsOptions & {
    readConfig?: (path: string) => Promise<string>;
  } = {},
): Promise<ReadonlyMap<string, DatasetDescriptor>> => {
  options.logger?.debug("loading dataset configuration", { path });
  return parseDatasets(await readConfig(path), (vaultCredentials, datasetId) =>
    resolveCredentials(vaultCredentials, datasetId, options),
  );
};

/**
 * Picks the dataset to provision: the named one, or the last configured
 */
export const selectDataset = (
  datasets: ReadonlyMap<string, DatasetDescriptor>,
  name?: string,
): DatasetDescriptor => {
  const selected =
    name === undefined ? [...datasets.values()].at(-1) : datasets.get(name);
  if (!selected) {
    const problem = datasetNotFound(name);
    throw new Error(problem.title, { cause: problem });
  }
  return selected;
};
