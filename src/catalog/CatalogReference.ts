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

import { z } from "zod";
import { optionalText } from "../_internal/schemas.ts";
import { unexpectedError } from "../common/problems.ts";

export type CatalogReferenceProperties = {
  id: string;
  path: string[];
  type: string;
};

export class CatalogReference {
  readonly id: CatalogReferenceProperties["id"];
  readonly path: CatalogReferenceProperties["path"];
  readonly type: CatalogReferenceProperties["type"];

  constructor(properties: CatalogReferenceProperties) {
    this.id = properties.id;
    this.path = properties.path;
    this.type = properties.type;
  }

  get name() {
    return this.path.at(-1) ?? "";
  }

  pathString = pathString(() => this.path);
}

const requiresQuotes = /\W/;

const pathString =
  (getPath: () => string[]) =>
  (SEPARATOR: string = "."): string => {
    return getPath()
      .map((part) => (requiresQuotes.test(part) ? `"${part}"` : part))
      .join(SEPARATOR);
  };

const catalogEntitySchema = z.object({
  entityType: optionalText,
  id: z.string(),
  name: optionalText,
  path: z.array(z.string()).nullable().catch(null),
  type: optionalText,
});

/**
 * Sources and spaces come back with a `name`, datasets and folders with a
 * `path`.
 */
export const catalogReferenceEntityToProperties = (
  entity: unknown,
): CatalogReferenceProperties => {
  const parsed = catalogEntitySchema.safeParse(entity);
  if (!parsed.success) {
    const problem = unexpectedError(
      `Unrecognized catalog entity: ${JSON.stringify(entity)}`,
    );
    throw new Error(problem.title, { cause: problem });
  }
  const { entityType, id, name, path, type } = parsed.data;
  return {
    id,
    path: path ?? (name ? [name] : []),
    type: entityType ?? type ?? "UNKNOWN",
  };
};

export const catalogReferenceFromEntity = (entity: unknown) =>
  new CatalogReference(catalogReferenceEntityToProperties(entity));
