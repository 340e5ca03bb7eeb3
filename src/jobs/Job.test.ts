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
import { CatalogService } from "../CatalogService.ts";
import { jobEntityToProperties } from "./Job.ts";
import { JOB_FAILED, JOB_TIMEOUT } from "./JobErrors.ts";
import { problemOf } from "../common/Problem.ts";

const ORIGIN = "http://catalog.test";

const server = setupServer();

before(() => server.listen({ onUnhandledRequest: "error" }));
afterEach(() => server.resetHandlers());
after(() => server.close());

const jobs = () => CatalogService({ origin: ORIGIN }).jobs;

/**
 * Serves the given job states one after another, repeating the last one
 */
const jobStates = (...states: string[]) => {
  let polls = 0;
  server.use(
    http.get(`${ORIGIN}/api/v3/job/job-1`, () => {
      const jobState = states[Math.min(polls, states.length - 1)];
      polls += 1;
      return HttpResponse.json({
        errorMessage: jobState === "FAILED" ? "table not found" : undefined,
        jobState,
        rowCount: 0,
      });
    }),
  );
  return () => polls;
};

describe("JobsResource", () => {
  test("submits the query and returns the job id", async () => {
    const bodies: unknown[] = [];
    server.use(
      http.post(`${ORIGIN}/api/v3/sql`, async ({ request }) => {
        bodies.push(await request.json());
        return HttpResponse.json({ id: "job-1" });
      }),
    );

    const id = await jobs().create({ context: ["src"], sql: "SELECT 1" });

    assert.equal(id.unwrap(), "job-1");
    assert.deepStrictEqual(bodies, [{ context: ["src"], sql: "SELECT 1" }]);
  });

  test("discovers the columns of a table", async () => {
    const bodies: unknown[] = [];
    server.use(
      http.post(`${ORIGIN}/api/v3/sql`, async ({ request }) => {
        bodies.push(await request.json());
        return HttpResponse.json({ id: "job-1" });
      }),
      http.get(`${ORIGIN}/api/v3/job/job-1/results`, () =>
        HttpResponse.json({
          rowCount: 0,
          rows: [],
          schema: [
            { name: "id", type: { name: "BIGINT" } },
            { name: "name", type: { name: "VARCHAR" } },
          ],
        }),
      ),
    );
    const polls = jobStates("RUNNING", "RUNNING", "COMPLETED");

    const columns = await jobs().columnsOf('src"."t"', { intervalMs: 0 });

    assert.deepStrictEqual(columns.unwrap(), ["id", "name"]);
    assert.deepStrictEqual(bodies, [{ sql: 'SELECT * FROM "src"."t" LIMIT 0' }]);
    assert.equal(polls(), 3);
  });
});

describe("Job.settle", () => {
  test("does not poll a job that already completed", async () => {
    const polls = jobStates("COMPLETED");
    const job = (await jobs().retrieve("job-1")).unwrap();

    const settled = await job.settle({ intervalMs: 0 });

    assert.equal(settled.state, "COMPLETED");
    assert.equal(polls(), 1);
  });

  test("gives up once the attempt budget is spent", async () => {
    const polls = jobStates("RUNNING");
    const job = (await jobs().retrieve("job-1")).unwrap();

    await assert.rejects(
      job.settle({ intervalMs: 0, maxAttempts: 3 }),
      (err: unknown) => {
        const problem = problemOf(err);
        return (
          problem?.type === JOB_TIMEOUT &&
          problem.detail === "Job job-1 did not settle after 3 polls."
        );
      },
    );
    assert.equal(polls(), 4);
  });

  test("rejects a job that failed", async () => {
    jobStates("RUNNING", "FAILED");
    const job = (await jobs().retrieve("job-1")).unwrap();

    await assert.rejects(job.settle({ intervalMs: 0 }), (err: unknown) => {
      const problem = problemOf(err);
      return (
        problem?.type === JOB_FAILED &&
        problem.detail === "Job job-1 ended in state FAILED: table not found"
      );
    });
  });
});

describe("jobEntityToProperties", () => {
  test("maps timestamps to dates", () => {
    const properties = jobEntityToProperties("job-1", {
      endedAt: "2026-01-02T03:04:06.000Z",
      jobState: "COMPLETED",
      rowCount: 12,
      startedAt: "2026-01-02T03:04:05.000Z",
    });

    assert.deepStrictEqual(properties, {
      endedAt: new Date("2026-01-02T03:04:06.000Z"),
      errorMessage: null,
      id: "job-1",
      rowCount: 12,
      startedAt: new Date("2026-01-02T03:04:05.000Z"),
      state: "COMPLETED",
    });
  });

  test("rejects an unknown job state", () => {
    assert.throws(() => jobEntityToProperties("job-1", { jobState: "DONE" }));
  });
});
