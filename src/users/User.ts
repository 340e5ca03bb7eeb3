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

export class User {
  readonly email: UserProperties["email"];
  readonly id: UserProperties["id"];
  readonly familyName: UserProperties["familyName"];
  readonly givenName: UserProperties["givenName"];
  readonly username: UserProperties["username"];

  constructor(properties: UserProperties) {
    this.email = properties.email;
    this.id = properties.id;
    this.familyName = properties.familyName;
    this.givenName = properties.givenName;
    this.username = properties.username;
  }

  get displayName(): string {
    if (this.givenName || this.familyName) {
      return [this.givenName, this.familyName].filter(Boolean).join(" ");
    }

    if (this.username) {
      return this.username;
    }

    if (this.email) {
      return this.email;
    }

    return this.id;
  }
}

const userEntitySchema = z.object({
  email: optionalText,
  firstName: optionalText,
  id: z.string(),
  lastName: optionalText,
  name: optionalText,
});

export const userEntityToProperties = (entity: unknown) => {
  const parsed = userEntitySchema.safeParse(entity);
  if (!parsed.success) {
    const problem = unexpectedError(
      `Unrecognized user entity: ${JSON.stringify(entity)}`,
    );
    throw new Error(problem.title, { cause: problem });
  }
  return {
    email: parsed.data.email,
    familyName: parsed.data.lastName,
    givenName: parsed.data.firstName,
    id: parsed.data.id,
    username: parsed.data.name,
  };
};

export type UserProperties = ReturnType<typeof userEntityToProperties>;
