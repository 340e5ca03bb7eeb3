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

import { createConnection } from "node:net";
import {
  catchError,
  defer,
  lastValueFrom,
  retry,
  throwError,
  timer,
} from "rxjs";
import type { Problem } from "../common/Problem.ts";
import type { Logger } from "../_internal/logger.ts";

export const SERVICE_NOT_READY =
  "https://api.catalog-provisioner.dev/problems/readiness/not-ready";

export const serviceNotReady = (host: string, port: number, attempts: number) =>
  ({
    detail: `${host}:${port} refused ${attempts} connection attempts.`,
    title: "The catalog service did not become reachable.",
    type: SERVICE_NOT_READY,
  }) as const satisfies Problem;

export type Connect = (host: string, port: number) => Promise<void>;

export const DEFAULT_READY_INTERVAL_MS = 10_000;
export const DEFAULT_READY_MAX_ATTEMPTS = 30;

/**
 * Opens a TCP connection and closes it as soon as it is established
 */
export const tcpConnect: Connect = (host, port) =>
  new Promise((resolve, reject) => {
    const socket = createConnection({ host, port });
    socket.once("connect", () => {
      socket.end();
      resolve();
    });
    socket.once("error", (err) => {
      socket.destroy();
      reject(err);
    });
  });

export type WaitReadyOptions = {
  connect?: Connect;
  intervalMs?: number;
  maxAttempts?: number;
  logger?: Logger;
};

/**
 * Retries a TCP connect until it succeeds. Rejects with the
 * `serviceNotReady` problem after `maxAttempts` failed attempts.
 */
export const waitReady = (
  host: string,
  port: number,
  {
    connect = tcpConnect,
    intervalMs = DEFAULT_READY_INTERVAL_MS,
    maxAttempts = DEFAULT_READY_MAX_ATTEMPTS,
    logger,
  }: WaitReadyOptions = {},
): Promise<void> => {
  let attempt = 0;
  return lastValueFrom(
    defer(() => {
      attempt += 1;
      logger?.info("waiting for the catalog service", { attempt, host, port });
      return connect(host, port);
    }).pipe(
      retry({
        count: Math.max(maxAttempts - 1, 0),
        delay: (err: unknown) => {
          logger?.info("catalog service unreachable, sleeping", {
            error: err instanceof Error ? err.message : String(err),
            intervalMs,
          });
          return timer(intervalMs);
        },
      }),
      catchError((err: unknown) => {
        const problem = serviceNotReady(host, port, attempt);
        return throwError(
          () =>
            new Error(problem.title, {
              cause: { ...problem, additionalDetails: err },
            }),
        );
      }),
    ),
    { defaultValue: undefined },
  );
};
