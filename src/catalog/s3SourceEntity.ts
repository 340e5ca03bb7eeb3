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

import type { CredentialPair } from "../vault/resolveCredentials.ts";

export type S3Source = {
  name: string;
  credentials: CredentialPair;
  /**
   * S3 endpoint host without a scheme, e.g. `minio.local:9000`
   */
  endpoint: string;
};

export const s3SourceEntity = ({ credentials, endpoint, name }: S3Source) =>
  ({
    config: {
      accessKey: credentials.accessKey,
      accessSecret: credentials.secretKey,
      allowCreateDrop: "true",
      compatibilityMode: "true",
      credentialType: "ACCESS_KEY",
      enableAsync: "true",
      enableFileStatusCheck: "true",
      isCachingEnabled: "true",
      maxCacheSpacePct: 100,
      propertyList: [
        { name: "fs.s3a.path.style.access", value: "true" },
        { name: "fs.s3a.endpoint", value: endpoint },
      ],
      requesterPays: "false",
      rootPath: "/",
      secure: "false",
    },
    entityType: "source",
    name,
    type: "S3",
  }) as const;

export const stripScheme = (endpoint: string): string => {
  const separator = endpoint.indexOf("://");
  return separator === -1 ? endpoint : endpoint.slice(separator + 3);
};
