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
import type {
  ResourceConfig,
  V2Config,
  V3Config,
} from "../_internal/types/Config.ts";
import { postJson, putJson } from "../_internal/jsonRequest.ts";
import { authHeaders } from "../credentials/authHeaders.ts";
import { User, userEntityToProperties } from "./User.ts";

export type NewUser = {
  username: string;
  password: string;
  firstName?: string;
  lastName?: string;
  email?: string;
};

export const UsersResource = (config: ResourceConfig & V2Config & V3Config) => ({
  /**
   * Registers the first administrator of a fresh catalog. The endpoint only
   * accepts unauthenticated requests.
   */
  bootstrapFirstUser: (
    user: NewUser & { createdAt?: number },
  ): Promise<Result<unknown, unknown>> =>
    putJson(
      config.v2Request,
      "bootstrap/firstuser",
      {
        createdAt: user.createdAt ?? Date.now(),
        email: user.email,
        firstName: user.firstName,
        lastName: user.lastName,
        password: user.password,
        userName: user.username,
      },
      authHeaders(null),
    )
      .then((response) => Ok(response))
      .catch((e: unknown) => Err(e)),

  create: (user: NewUser): Promise<Result<User, unknown>> =>
    postJson(config.v3Request, "user", {
      email: user.email,
      firstName: user.firstName,
      lastName: user.lastName,
      name: user.username,
      password: user.password,
    })
      .then((entity) => Ok(new User(userEntityToProperties(entity))))
      .catch((e: unknown) => Err(e)),
});
