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

import "dotenv/config";
import { createLogger } from "./_internal/logger.ts";
import { problemOf } from "./common/Problem.ts";
import { provision } from "./provisioning/provision.ts";
import { settingsFromEnv } from "./settings/settingsFromEnv.ts";

const describe = (err: unknown): string => {
  const problem = problemOf(err);
  if (problem) {
    return problem.detail ? `${problem.title} ${problem.detail}` : problem.title;
  }
  return err instanceof Error ? err.message : String(err);
};

const main = async () => {
  const settings = settingsFromEnv(process.env);
  const logger = createLogger({
    level: settings.logLevel,
    name: "catalog-provisioner",
  });
  const summary = await provision(settings, { logger });
  logger.info("finished", {
    dataset: summary.dataset,
    view: summary.viewPath.join("."),
  });
};

main().catch((err: unknown) => {
  console.error(`provisioning failed: ${describe(err)}`);
  process.exitCode = 1;
});
