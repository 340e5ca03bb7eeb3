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

import { parse } from "yaml";
import { z } from "zod";
import type {
  CredentialPair,
  VaultCredentialsConfig,
} from "../vault/resolveCredentials.ts";
import { malformedDatasetEntry } from "./ConfigErrors.ts";
import { decodeTransformations } from "./decodeTransformations.ts";

export type DatasetDescriptor = {
  /**
   * Full dataset id, e.g. `sample-ns/customers`
   */
  readonly id: string;
  /**
   * Second segment of the id
   */
  readonly name: string;
  readonly format: string;
  readonly endpointUrl: string;
  readonly path: string;
  readonly transformation: string;
  readonly transformationColumns: readonly string[];
  readonly credentials: CredentialPair;
};

export type ResolveDatasetCredentials = (
  vaultCredentials: VaultCredentialsConfig,
  datasetId: string,
) => Promise<CredentialPair>;

const vaultCredentialsSchema = z.object({
  address: z.string().optional(),
  authPath: z.string().optional(),
  jwt_file_path: z.string().optional(),
  role: z.string().optional(),
  secretPath: z.string().optional(),
});

const datasetEntrySchema = z.object({
  name: z.string().refine((id) => Boolean(id.split("/")[1])),
  format: z.string(),
  path: z.string(),
  connection: z.object({
    s3: z.object({
      endpoint_url: z.string(),
      vault_credentials: vaultCredentialsSchema,
    }),
  }),
  transformations: z.string(),
});

const documentSchema = z.record(z.unknown());

const datasetListSchema = z.array(z.unknown());

const malformed = (field: string): never => {
  const problem = malformedDatasetEntry(field);
  throw new Error(problem.title, { cause: problem });
};

const firstIssuePath = (error: z.ZodError) =>
  error.issues[0]?.path.join(".") || "entry";

const toDatasetDescriptor = async (
  raw: unknown,
  resolve: ResolveDatasetCredentials,
): Promise<DatasetDescriptor> => {
  const parsed = datasetEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return malformed(firstIssuePath(parsed.error));
  }
  const entry = parsed.data;
  const credentials = await resolve(
    entry.connection.s3.vault_credentials,
    entry.name,
  );
  const transformation = decodeTransformations(entry.transformations);

  return Object.freeze({
    credentials,
    endpointUrl: entry.connection.s3.endpoint_url,
    format: entry.format,
    id: entry.name,
    name: entry.name.split("/")[1] ?? entry.name,
    path: entry.path,
    transformation: transformation.name,
    transformationColumns: transformation.columns,
  });
};

/**
 * Builds a descriptor for every entry listed under a top-level key whose
 * name contains `data`, in document order. Entries are resolved one after
 * another; a later entry with the same local name replaces an earlier one
 * and moves to the end.
 */
export const parseDatasets = async (
  source: string,
  resolve: ResolveDatasetCredentials,
): Promise<ReadonlyMap<string, DatasetDescriptor>> => {
  const content = documentSchema.safeParse(parse(source));
  const datasets = new Map<string, DatasetDescriptor>();
  if (!content.success) {
    return datasets;
  }

  for (const [key, value] of Object.entries(content.data)) {
    if (!key.includes("data")) {
      continue;
    }
    const entries = datasetListSchema.safeParse(value);
    if (!entries.success) {
      return malformed(key);
    }
    for (const entry of entries.data) {
      const descriptor = await toDatasetDescriptor(entry, resolve);
      datasets.delete(descriptor.name);
      datasets.set(descriptor.name, descriptor);
    }
  }
  return datasets;
};
