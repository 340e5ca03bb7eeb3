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

import assert from "node:assert/strict";
import test, { after, afterEach, before, describe } from "node:test";
import { http, HttpResponse } from "msw";
import { setupServer } from "msw/node";
import { fromUsernamePassword, login } from "./fromUsernamePassword.ts";
import { CatalogService } from "../CatalogService.ts";
import { HttpError, tokenInvalidError } from "../common/HttpError.ts";

const ORIGIN = "http://catalog.test";

const server = setupServer();

before(() => server.listen({ onUnhandledRequest: "error" }));
afterEach(() => server.resetHandlers());
after(() => server.close());

const loginHandler = (logins: unknown[]) =>
  http.post(`${ORIGIN}/apiv2/login`, async ({ request }) => {
    logins.push(await request.json());
    return HttpResponse.json({ token: "test-token", userName: "adminUser" });
  });

describe("login", () => {
  test("exchanges a username and password for auth headers", async () => {
    const logins: unknown[] = [];
    server.use(loginHandler(logins));

    const headers = await login({ origin: ORIGIN }, "adminUser", "test-password");

    assert.deepStrictEqual(headers, {
      Authorization: "_dremiotest-token",
      "Content-Type": "application/json",
    });
    assert.deepStrictEqual(logins, [
      { password: "test-password", userName: "adminUser" },
    ]);
  });

  test("rejects refused credentials", async () => {
    server.use(
      http.post(`${ORIGIN}/apiv2/login`, () =>
        HttpResponse.json({ errorMessage: "Login failed" }, { status: 401 }),
      ),
    );

    await assert.rejects(
      login({ origin: ORIGIN }, "adminUser", "wrong-password"),
      (err: unknown) =>
        err instanceof HttpError &&
        err.status === 401 &&
        err.body === tokenInvalidError,
    );
  });

  test("rejects a response without a token", async () => {
    server.use(
      http.post(`${ORIGIN}/apiv2/login`, () => HttpResponse.json({ userName: "adminUser" })),
    );

    await assert.rejects(
      login({ origin: ORIGIN }, "adminUser", "test-password"),
      { message: "An unexpected error occurred while processing this request." },
    );
  });
});

describe("fromUsernamePassword", () => {
  test("logs in once and signs every request", async () => {
    const logins: unknown[] = [];
    const authorizations: (string | null)[] = [];
    server.use(
      loginHandler(logins),
      http.get(`${ORIGIN}/api/v3/catalog/by-path/Space-api`, ({ request }) => {
        authorizations.push(request.headers.get("Authorization"));
        return HttpResponse.json({ entityType: "space", id: "space-1", name: "Space-api" });
      }),
    );
    const { catalog } = CatalogService({
      credentials: fromUsernamePassword("adminUser", "test-password"),
      origin: ORIGIN,
    });

    await catalog.retrieveByPath(["Space-api"]);
    await catalog.retrieveByPath(["Space-api"]);

    assert.equal(logins.length, 1);
    assert.deepStrictEqual(authorizations, [
      "_dremiotest-token",
      "_dremiotest-token",
    ]);
  });

  test("logs in again after a failed login", async () => {
    let attempts = 0;
    server.use(
      http.post(`${ORIGIN}/apiv2/login`, () => {
        attempts += 1;
        return attempts === 1
          ? HttpResponse.json({ errorMessage: "starting" }, { status: 503 })
          : HttpResponse.json({ token: "test-token" });
      }),
    );
    const credentials = fromUsernamePassword("adminUser", "test-password");

    await assert.rejects(credentials.get({ origin: ORIGIN }));
    assert.equal(await credentials.get({ origin: ORIGIN }), "test-token");
    assert.equal(attempts, 2);
  });
});
