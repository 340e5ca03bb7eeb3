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
import { invalidSetting } from "../common/problems.ts";
import { LOG_LEVELS, type LogLevel } from "../_internal/logger.ts";
import type { NewUser } from "../users/UsersResource.ts";
import { DEFAULT_TABLE_FORMAT } from "../catalog/CatalogResource.ts";
import { DEFAULT_DATASET_CONFIG_PATH } from "../config/loadDatasets.ts";
import {
  DEFAULT_JOB_MAX_ATTEMPTS,
  DEFAULT_JOB_POLL_INTERVAL_MS,
} from "../jobs/Job.ts";
import {
  DEFAULT_READY_INTERVAL_MS,
  DEFAULT_READY_MAX_ATTEMPTS,
} from "../readiness/waitReady.ts";

export type ProvisioningSettings = {
  catalog: {
    origin: string;
    host: string;
    port: number;
  };
  admin: Required<NewUser>;
  newUser: NewUser;
  sourceName: string;
  spaceName: string;
  vdsName: string;
  tableFormat: string;
  datasetConfigPath: string;
  datasetName?: string;
  readiness: { intervalMs: number; maxAttempts: number };
  jobPolling: { intervalMs: number; maxAttempts: number };
  logLevel: LogLevel;
};

export const DEFAULT_CATALOG_ORIGIN =
  "http://localhost:9047";

type Env = Record<string, string | undefined>;

const invalid = (name: string, value: string): never => {
  const problem = invalidSetting(name, value);
  throw new Error(problem.title, { cause: problem });
};

const integerSetting =
  (schema: z.ZodNumber) =>
  (env: Env, name: string, fallback: number): number => {
    const raw = env[name];
    if (raw === undefined || raw === "") {
      return fallback;
    }
    const parsed = schema.safeParse(raw);
    return parsed.success ? parsed.data : invalid(name, raw);
  };

const attempts = integerSetting(z.coerce.number().int().min(1));
const milliseconds = integerSetting(z.coerce.number().int().nonnegative());
const port = integerSetting(z.coerce.number().int().min(1).max(65535));

const logLevelSchema = z.enum(LOG_LEVELS);
const originSchema = z.string().url();

const text = (env: Env, name: string, fallback: string): string =>
  env[name] || fallback;

const catalogEndpoint = (env: Env) => {
  const origin = text(env, "CATALOG_ORIGIN", DEFAULT_CATALOG_ORIGIN);
  if (!originSchema.safeParse(origin).success) {
    return invalid("CATALOG_ORIGIN", origin);
  }
  const url = new URL(origin);
  const defaultPort = url.port
    ? Number(url.port)
    : url.protocol === "https:"
      ? 443
      : 80;
  return {
    host: text(env, "CATALOG_HOST", url.hostname),
    origin,
    port: port(env, "CATALOG_PORT", defaultPort),
  };
};

/**
 * Reads the provisioning settings from environment variables, falling back
 * to the defaults of the sample deployment.
 */
export const settingsFromEnv = (env: Env): ProvisioningSettings => {
  const logLevel = text(env, "LOG_LEVEL", "trace");
  const level = logLevelSchema.safeParse(logLevel);
  return {
    admin: {
      email: text(env, "ADMIN_EMAIL", "test@test.com"),
      firstName: text(env, "ADMIN_FIRST_NAME", "user"),
      lastName: text(env, "ADMIN_LAST_NAME", "admin"),
      password: text(env, "ADMIN_PASSWORD", "adminPwd1"),
      username: text(env, "ADMIN_USERNAME", "adminUser"),
    },
    catalog: catalogEndpoint(env),
    datasetConfigPath: text(
      env,
      "DATASET_CONFIG_PATH",
      DEFAULT_DATASET_CONFIG_PATH,
    ),
    datasetName: env["DATASET_NAME"] || undefined,
    jobPolling: {
      intervalMs: milliseconds(
        env,
        "JOB_POLL_INTERVAL_MS",
        DEFAULT_JOB_POLL_INTERVAL_MS,
      ),
      maxAttempts: attempts(
        env,
        "JOB_MAX_ATTEMPTS",
        DEFAULT_JOB_MAX_ATTEMPTS,
      ),
    },
    logLevel: level.success ? level.data : invalid("LOG_LEVEL", logLevel),
    newUser: {
      firstName: text(env, "NEW_USER_FIRST_NAME", "first"),
      password: text(env, "NEW_USER_PASSWORD", "testpassword123"),
      username: text(env, "NEW_USER_NAME", "newUser"),
    },
    readiness: {
      intervalMs: milliseconds(
        env,
        "READY_INTERVAL_MS",
        DEFAULT_READY_INTERVAL_MS,
      ),
      maxAttempts: attempts(
        env,
        "READY_MAX_ATTEMPTS",
        DEFAULT_READY_MAX_ATTEMPTS,
      ),
    },
    sourceName: text(env, "SOURCE_NAME", "sample-iceberg"),
    spaceName: text(env, "SPACE_NAME", "Space-api"),
    tableFormat: text(env, "TABLE_FORMAT", DEFAULT_TABLE_FORMAT),
    vdsName: text(env, "VDS_NAME", "sample-iceberg-vds"),
  };
};
