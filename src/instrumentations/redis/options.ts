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
import {
  assertNoExtraneousProperties,
  getEnvBoolean,
  getEnvEnum,
  getNonEmptyEnvVar,
} from '../../utils';
import type { DbStatementMode, RedisInstrumentationConfig } from './types';

export const DB_STATEMENT_MODES: readonly DbStatementMode[] = [
  'omit',
  'obfuscate',
  'raw',
];

const allowedOptions: (keyof RedisInstrumentationConfig)[] = [
  'enabled',
  'dbStatement',
  'recordValueSize',
  'peerService',
  'traceRootSpans',
  'attributes',
  'responseHook',
  'suppressInternalInstrumentation',
];

export function _setDefaultOptions(
  options: RedisInstrumentationConfig = {}
): RedisInstrumentationConfig {
  assertNoExtraneousProperties(options, allowedOptions);

  if (
    options.dbStatement !== undefined &&
    !DB_STATEMENT_MODES.includes(options.dbStatement)
  ) {
    throw new Error(
      `Invalid dbStatement: '${options.dbStatement}'. Expected one of ${DB_STATEMENT_MODES.join(', ')}`
    );
  }

  return {
    ...options,
    dbStatement:
      options.dbStatement ??
      getEnvEnum(
        'OTEL_INSTRUMENTATION_REDIS_DB_STATEMENT',
        DB_STATEMENT_MODES,
        'obfuscate'
      ),
    recordValueSize:
      options.recordValueSize ??
      getEnvBoolean('OTEL_INSTRUMENTATION_REDIS_RECORD_VALUE_SIZE', false),
    peerService:
      options.peerService ??
      getNonEmptyEnvVar('OTEL_INSTRUMENTATION_REDIS_PEER_SERVICE'),
    traceRootSpans:
      options.traceRootSpans ??
      getEnvBoolean('OTEL_INSTRUMENTATION_REDIS_TRACE_ROOT_SPANS', true),
    attributes: options.attributes ?? {},
  };
}
