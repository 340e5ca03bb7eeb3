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

import { Err, Ok, type Result } from "ts-results-es";
import type { ResourceConfig, V3Config } from "../_internal/types/Config.ts";
import { getJson, postJson } from "../_internal/jsonRequest.ts";
import { HttpError } from "../common/HttpError.ts";
import { hasProblemType } from "../common/Problem.ts";
import {
  CatalogReference,
  catalogReferenceFromEntity,
} from "./CatalogReference.ts";
import { CATALOG_OBJECT_NOT_FOUND, catalogObjectNotFound } from "./CatalogErrors.ts";
import { s3SourceEntity, type S3Source } from "./s3SourceEntity.ts";

export const DEFAULT_TABLE_FORMAT = "Iceberg";

export type ViewProperties = {
  path: string[];
  sql: string;
  sqlContext: string[];
};

const referenceOrNull = (entity: unknown) =>
  entity === null ? null : catalogReferenceFromEntity(entity);

export const CatalogResource = (config: ResourceConfig & V3Config) => {
  const create = (
    entity: unknown,
  ): Promise<Result<CatalogReference | null, unknown>> =>
    postJson(config.v3Request, "catalog", entity)
      .then((response) => Ok(referenceOrNull(response)))
      .catch((e: unknown) => Err(e));

  const retrieveByPath = (
    path: string[],
  ): Promise<Result<CatalogReference, unknown>> =>
    getJson(
      config.v3Request,
      `catalog/by-path/${path.map(encodeURIComponent).join("/")}`,
    )
      .then((entity) => Ok(catalogReferenceFromEntity(entity)))
      .catch((e: unknown) => {
        if (e instanceof HttpError && e.status === 404) {
          const problem = catalogObjectNotFound(path);
          return Err(new Error(problem.title, { cause: problem }));
        }
        return Err(e);
      });

  const createSpace = (name: string) => create({ entityType: "space", name });

  return {
    createSource: (source: S3Source) => create(s3SourceEntity(source)),

    createSpace,

    createView: ({ path, sql, sqlContext }: ViewProperties) =>
      create({
        entityType: "dataset",
        path,
        sql,
        sqlContext,
        type: "VIRTUAL_DATASET",
      }),

    /**
     * Creates the space unless something already exists at its path
     */
    ensureSpace: async (
      name: string,
    ): Promise<Result<CatalogReference | null, unknown>> => {
      const existing = await retrieveByPath([name]);
      if (existing.isOk()) {
        config.logger?.debug("space already exists", { space: name });
        return existing;
      }
      if (!hasProblemType(existing.error, CATALOG_OBJECT_NOT_FOUND)) {
        return existing;
      }
      return createSpace(name);
    },

    /**
     * Promotes a folder of `sourceName` into a physical dataset and returns
     * its catalog path, starting with the source name.
     */
    promote: (
      sourceName: string,
      path: string,
      format: string = DEFAULT_TABLE_FORMAT,
    ): Promise<Result<string[], unknown>> => {
      const pathList = [sourceName, ...path.split("/")];
      const id = `dremio:/${sourceName}/${path}`;
      return postJson(
        config.v3Request,
        `catalog/${encodeURIComponent("dremio:/")}${pathList.join("%2F")}`,
        {
          entityType: "dataset",
          format: { type: format },
          id,
          path: pathList,
          type: "PHYSICAL_DATASET",
        },
      )
        .then((response) => {
          config.logger?.debug("promote response", { response });
          return Ok(pathList);
        })
        .catch((e: unknown) => Err(e));
    },

    retrieveByPath,
  };
};
