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
import type { Config } from "../_internal/types/Config.ts";
import type { CredentialProvider } from "./CredentialProvider.ts";
import { HttpError } from "../common/HttpError.ts";
import { unexpectedError } from "../common/problems.ts";
import { authHeaders, type AuthHeaders } from "./authHeaders.ts";

const loginResponseSchema = z.object({ token: z.string() });

export const requestLoginToken = (
  config: Pick<Config, "origin" | "fetch" | "logger">,
  username: string,
  password: string,
): Promise<string> =>
  (config.fetch || globalThis.fetch)(
    new URL("/apiv2/login", config.origin).toString(),
    {
      body: JSON.stringify({ password, userName: username }),
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      method: "POST",
    },
  )
    .then(async (res) => {
      config.logger?.info(`login response: ${res.status}`, { username });
      if (!res.ok) {
        throw await HttpError.fromResponse(res);
      }
      return res.json();
    })
    .then((body: unknown) => {
      const parsed = loginResponseSchema.safeParse(body);
      if (parsed.success) {
        return parsed.data.token;
      }
      const problem = unexpectedError("The login response has no token.");
      throw new Error(problem.title, { cause: problem });
    });

export const login = async (
  config: Pick<Config, "origin" | "fetch" | "logger">,
  username: string,
  password: string,
): Promise<AuthHeaders> =>
  authHeaders(await requestLoginToken(config, username, password));

/**
 * Logs in on first use and reuses the token for the rest of the run
 */
export const fromUsernamePassword = (
  username: string,
  password: string,
): CredentialProvider => {
  let token: Promise<string> | undefined;
  return {
    get: (config) => {
      token ??= requestLoginToken(config, username, password).catch(
        (e: unknown) => {
          token = undefined;
          throw e;
        },
      );
      return token;
    },
  };
};
