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

/**
 * Prefix the catalog service expects in front of session tokens
 */
export const AUTH_SCHEME_TAG = "_dremio";

export type AuthHeaders = Readonly<Record<string, string>>;

/**
 * A `null` token produces the unauthenticated header accepted by the
 * first-user bootstrap endpoint.
 */
export const authHeaders = (token: string | null): AuthHeaders => ({
  Authorization: `${AUTH_SCHEME_TAG}${token}`,
  "Content-Type": "application/json",
});
