/*
 * Copyright Splunk Inc.
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
export {
  DBSYSTEMVALUES_REDIS,
  SEMATTRS_DB_REDIS_DATABASE_INDEX,
  SEMATTRS_DB_STATEMENT,
  SEMATTRS_DB_SYSTEM,
  SEMATTRS_NET_PEER_NAME,
  SEMATTRS_NET_PEER_PORT,
  SEMATTRS_PEER_SERVICE,
} from '@opentelemetry/semantic-conventions';

export const ATTR_DB_SET_VALUE_SIZE_BYTES = 'db.set_value_size_bytes' as const;
export const ATTR_DB_RETRIEVED_VALUE_SIZE_BYTES =
  'db.retrieved_value_size_bytes' as const;

export const PIPELINED_SPAN_NAME = 'PIPELINED';
