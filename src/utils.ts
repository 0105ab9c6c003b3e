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

import { strict as assert } from 'assert';
import { diag, DiagLogLevel } from '@opentelemetry/api';
import type { EnvVarKey, LogLevel } from './types';

export function getNonEmptyEnvVar(key: EnvVarKey): string | undefined {
  const value = process.env[key];

  if (value !== undefined) {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      diag.warn(
        `Defined, but empty environment variable: '${key}'. The value will be considered as undefined.`
      );
      return undefined;
    }

    return trimmed;
  }

  return value;
}

export function parseEnvBooleanString(value?: string): boolean | undefined {
  if (typeof value !== 'string') {
    return value;
  }

  value = value.trim().toLowerCase();

  if (!value || ['false', 'no', 'n', '0'].indexOf(value) >= 0) {
    return false;
  }

  if (['true', 'yes', 'y', '1'].indexOf(value) >= 0) {
    return true;
  }

  throw new Error(`Invalid string representing boolean: ${value}`);
}

export function getEnvBoolean(key: EnvVarKey, defaultValue = true): boolean {
  const value = getNonEmptyEnvVar(key);

  try {
    return parseEnvBooleanString(value) ?? defaultValue;
  } catch (e) {
    diag.warn(
      `Invalid value for ${key}: '${value}'. Falling back to '${defaultValue}'.`,
      e
    );
    return defaultValue;
  }
}

export function getEnvEnum<T extends string>(
  key: EnvVarKey,
  allowed: readonly T[],
  defaultValue: T
): T {
  const value = getNonEmptyEnvVar(key);

  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.toLowerCase();
  const match = allowed.find((v) => v === normalized);

  if (match === undefined) {
    diag.warn(
      `Invalid value for ${key}: '${value}'. Allowed: ${formatStringSet(
        allowed
      )}. Falling back to '${defaultValue}'.`
    );
    return defaultValue;
  }

  return match;
}

const formatStringSet = (set: Set<string> | readonly string[]) => {
  return [...set.values()].map((item) => `"${item}"`).join(', ');
};

export function assertNoExtraneousProperties(
  obj: object,
  expectedProps: string[]
) {
  const keys = new Set(Object.keys(obj));
  for (const p of expectedProps) {
    keys.delete(p);
  }

  assert.equal(
    keys.size,
    0,
    `Unexpected configuration options: ${formatStringSet(
      keys
    )}. Allowed: ${formatStringSet(expectedProps)}`
  );
}

function validLogLevel(level: string): level is LogLevel {
  return ['verbose', 'debug', 'info', 'warn', 'error'].includes(level);
}

export function toDiagLogLevel(level: LogLevel): DiagLogLevel {
  switch (level) {
    case 'verbose':
      return DiagLogLevel.VERBOSE;
    case 'debug':
      return DiagLogLevel.DEBUG;
    case 'info':
      return DiagLogLevel.INFO;
    case 'warn':
      return DiagLogLevel.WARN;
    case 'error':
      return DiagLogLevel.ERROR;
  }

  return DiagLogLevel.NONE;
}

export function parseLogLevel(value: string | null | undefined): DiagLogLevel {
  if (value === undefined || value === null) {
    return DiagLogLevel.NONE;
  }

  const v = value.trim().toLowerCase();

  if (validLogLevel(v)) {
    return toDiagLogLevel(v);
  }

  return DiagLogLevel.NONE;
}

export function listEnvVars() {
  return [
    {
      name: 'OTEL_INSTRUMENTATION_REDIS_DB_STATEMENT',
      property: 'dbStatement',
      description:
        'How command arguments appear in the db.statement span attribute. Allowed values are omit, obfuscate and raw.',
      default: 'obfuscate',
      type: 'string',
      category: 'instrumentation',
    },
    {
      name: 'OTEL_INSTRUMENTATION_REDIS_PEER_SERVICE',
      property: 'peerService',
      description:
        'Name of the Redis service, recorded as the peer.service span attribute.',
      default: '',
      type: 'string',
      category: 'instrumentation',
    },
    {
      name: 'OTEL_INSTRUMENTATION_REDIS_RECORD_VALUE_SIZE',
      property: 'recordValueSize',
      description:
        'Records the size in bytes of values sent by SET and returned by GET and MGET.',
      default: 'false',
      type: 'boolean',
      category: 'instrumentation',
    },
    {
      name: 'OTEL_INSTRUMENTATION_REDIS_TRACE_ROOT_SPANS',
      property: 'traceRootSpans',
      description:
        'Whether to create spans for commands issued outside of an active trace.',
      default: 'true',
      type: 'boolean',
      category: 'instrumentation',
    },
    {
      name: 'OTEL_LOG_LEVEL',
      property: 'logLevel',
      description:
        'Log level for the OpenTelemetry diagnostic console logger. To activate debug logging, set the debug value. Available values are error, info, debug, and verbose.',
      default: 'none',
      type: 'string',
      category: 'general',
    },
  ];
}
