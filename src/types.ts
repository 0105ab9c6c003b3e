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

export type LogLevel = 'none' | 'verbose' | 'debug' | 'info' | 'warn' | 'error';

export type EnvVarKey =
  | 'OTEL_INSTRUMENTATION_REDIS_DB_STATEMENT'
  | 'OTEL_INSTRUMENTATION_REDIS_PEER_SERVICE'
  | 'OTEL_INSTRUMENTATION_REDIS_RECORD_VALUE_SIZE'
  | 'OTEL_INSTRUMENTATION_REDIS_TRACE_ROOT_SPANS'
  | 'OTEL_LOG_LEVEL';
