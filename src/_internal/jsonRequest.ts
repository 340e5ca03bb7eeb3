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

import type { RequestFn } from "./types/Config.ts";

export const getJson = (request: RequestFn, path: string): Promise<unknown> =>
  request(path).then((res) => res.json());

const sendJson =
  (method: "POST" | "PUT") =>
  (
    request: RequestFn,
    path: string,
    body: unknown,
    headers: Record<string, string> = {},
  ): Promise<unknown> =>
    request(path, {
      body: JSON.stringify(body),
      headers: { "Content-Type": "application/json", ...headers },
      method,
    })
      .then((res) => res.text())
      .then((text) => {
        // acknowledgements may come back without a body
        if (!text) {
          return null;
        }
        const parsed: unknown = JSON.parse(text);
        return parsed;
      });

export const postJson = sendJson("POST");
export const putJson = sendJson("PUT");
