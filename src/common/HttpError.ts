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
import type { Problem } from "./Problem.ts";
import { unexpectedError } from "./problems.ts";

const catalogApiErrorSchema = z.object({
  errorMessage: z.string(),
  moreInfo: z.string().optional(),
});

const describeBody = (body: unknown): string =>
  typeof body === "string" ? body : JSON.stringify(body);

const errorMessageOf = (body: unknown): string => {
  const apiError = catalogApiErrorSchema.safeParse(body);
  return apiError.success ? apiError.data.errorMessage : describeBody(body);
};

const extractResponseBody = async (res: Response): Promise<Problem> => {
  let result: unknown;

  if (res.headers.get("content-type")?.includes("application/json")) {
    result = await res.json();
  } else {
    result = await res.text();
  }

  switch (res.status) {
    case 401:
      return tokenInvalidError;
    case 500:
    case 502:
    case 503:
    case 504:
      return systemError(errorMessageOf(result));
    default:
      return unexpectedError(errorMessageOf(result));
  }
};

/**
 * A non-2xx answer from the catalog service. The message is the problem
 * title; `body.detail` carries what the service said.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly body: Problem;
  constructor(status: number, body: Problem) {
    super(body.title);
    this.status = status;
    this.body = body;
  }

  static async fromResponse(res: Response) {
    return new HttpError(res.status, await extractResponseBody(res));
  }
}

const systemError = (detail: string) =>
  ({
    detail,
    title: "The catalog service failed while handling a provisioning request.",
    type: "https://api.catalog-provisioner.dev/problems/system-error",
  }) as const satisfies Problem;

export const tokenInvalidError = {
  title: "The catalog service rejected the provisioning credentials.",
  type: "https://api.catalog-provisioner.dev/problems/auth/token-invalid",
} as const satisfies Problem;
