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
import { authenticate } from "./authenticate.ts";
import { fetchSecret } from "./fetchSecret.ts";
import { createRecordingLogger } from "../_internal/recordingLogger.ts";

const VAULT = "http://vault.test";
const AUTH_PATH = "/v1/auth/kubernetes/login";
const SECRET_PATH = "/v1/secret/data/cred";

const server = setupServer();

before(() => server.listen({ onUnhandledRequest: "error" }));
afterEach(() => server.resetHandlers());
after(() => server.close());

const loginReturning = (body: Record<string, unknown>) =>
  http.post(`${VAULT}${AUTH_PATH}`, () => HttpResponse.json(body));

describe("authenticate", () => {
  test("posts the jwt and role and returns the body", async () => {
    const bodies: unknown[] = [];
    server.use(
      http.post(`${VAULT}${AUTH_PATH}`, async ({ request }) => {
        bodies.push(await request.json());
        return HttpResponse.json({ auth: { client_token: "test-client-token" } });
      }),
    );

    const response = await authenticate("test-jwt", VAULT, AUTH_PATH, "demo");

    assert.deepStrictEqual(bodies, [{ jwt: "test-jwt", role: "demo" }]);
    assert.equal(response.isSome(), true);
    assert.deepStrictEqual(response.unwrap(), {
      auth: { client_token: "test-client-token" },
    });
  });

  test("logs and returns nothing on a refused login", async () => {
    server.use(
      http.post(`${VAULT}${AUTH_PATH}`, () =>
        HttpResponse.json({ errors: ["permission denied"] }, { status: 403 }),
      ),
    );
    const { entries, logger } = createRecordingLogger();

    const response = await authenticate("test-jwt", VAULT, AUTH_PATH, "demo", {
      datasetId: "ns/ds",
      logger,
    });

    assert.equal(response.isNone(), true);
    assert.deepStrictEqual(
      entries.filter((entry) => entry.level === "error"),
      [
        {
          fields: {
            datasetId: "ns/ds",
            error: '403: {"errors":["permission denied"]}',
          },
          level: "error",
          message: "vault authentication failed",
        },
      ],
    );
  });
});

describe("fetchSecret", () => {
  test("reads the secret with the session token", async () => {
    const tokens: (string | null)[] = [];
    server.use(
      loginReturning({ auth: { client_token: "test-client-token" } }),
      http.get(`${VAULT}${SECRET_PATH}`, ({ request }) => {
        tokens.push(request.headers.get("X-Vault-Token"));
        return HttpResponse.json({
          data: { access_key: "test-access", secret_key: "test-secret" },
        });
      }),
    );

    const secret = await fetchSecret(
      "test-jwt",
      SECRET_PATH,
      VAULT,
      AUTH_PATH,
      "demo",
    );

    assert.deepStrictEqual(tokens, ["test-client-token"]);
    assert.deepStrictEqual(secret.unwrap(), {
      access_key: "test-access",
      secret_key: "test-secret",
    });
  });

  test("returns nothing when the login has no client token", async () => {
    server.use(loginReturning({ auth: {} }));
    const { logger, messages } = createRecordingLogger();

    const secret = await fetchSecret(
      "test-jwt",
      SECRET_PATH,
      VAULT,
      AUTH_PATH,
      "demo",
      { logger },
    );

    assert.equal(secret.isNone(), true);
    assert.deepStrictEqual(messages("error"), [
      "malformed vault authorization response",
    ]);
  });

  test("returns nothing when the login is refused", async () => {
    server.use(
      http.post(`${VAULT}${AUTH_PATH}`, () =>
        HttpResponse.text("denied", { status: 403 }),
      ),
    );
    const { logger, messages } = createRecordingLogger();

    const secret = await fetchSecret(
      "test-jwt",
      SECRET_PATH,
      VAULT,
      AUTH_PATH,
      "demo",
      { logger },
    );

    assert.equal(secret.isNone(), true);
    assert.deepStrictEqual(messages("error"), [
      "vault authentication failed",
      "empty vault authorization response",
    ]);
  });

  test("returns nothing when the secret cannot be read", async () => {
    server.use(
      loginReturning({ auth: { client_token: "test-client-token" } }),
      http.get(`${VAULT}${SECRET_PATH}`, () =>
        HttpResponse.text("missing", { status: 404 }),
      ),
    );
    const { entries, logger } = createRecordingLogger();

    const secret = await fetchSecret(
      "test-jwt",
      SECRET_PATH,
      VAULT,
      AUTH_PATH,
      "demo",
      { datasetId: "ns/ds", logger },
    );

    assert.equal(secret.isNone(), true);
    assert.deepStrictEqual(
      entries.filter((entry) => entry.level === "error"),
      [
        {
          fields: { datasetId: "ns/ds", error: "404: missing" },
          level: "error",
          message: "error reading credentials from vault",
        },
      ],
    );
  });

  test("returns nothing when the secret has no data field", async () => {
    server.use(
      loginReturning({ auth: { client_token: "test-client-token" } }),
      http.get(`${VAULT}${SECRET_PATH}`, () =>
        HttpResponse.json({ metadata: { version: 1 } }),
      ),
    );
    const { logger, messages } = createRecordingLogger();

    const secret = await fetchSecret(
      "test-jwt",
      SECRET_PATH,
      VAULT,
      AUTH_PATH,
      "demo",
      { logger },
    );

    assert.equal(secret.isNone(), true);
    assert.deepStrictEqual(messages("error"), [
      "malformed secret response, expected the 'data' field",
    ]);
  });
});
