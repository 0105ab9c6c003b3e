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
  diag,
  DiagConsoleLogger,
  DiagLogLevel,
  TracerProvider,
} from '@opentelemetry/api';
import { RedisInstrumentation } from './instrumentations/redis';
import type { RedisInstrumentationConfig } from './instrumentations/redis';
import type { LogLevel } from './types';
import {
  assertNoExtraneousProperties,
  getNonEmptyEnvVar,
  parseLogLevel,
  toDiagLogLevel,
} from './utils';

export interface Options {
  logLevel?: LogLevel;
  /** Defaults to the globally registered tracer provider. */
  tracerProvider?: TracerProvider;
  redis: RedisInstrumentationConfig;
}

interface RunningState {
  redis: RedisInstrumentation | null;
}

const running: RunningState = {
  redis: null,
};

export const start = (options: Partial<Options> = {}) => {
  assertNoExtraneousProperties(options, ['logLevel', 'tracerProvider', 'redis']);

  if (running.redis) {
    throw new Error('Redis command tracing already started');
  }

  const logLevel = options.logLevel
    ? toDiagLogLevel(options.logLevel)
    : parseLogLevel(getNonEmptyEnvVar('OTEL_LOG_LEVEL'));

  if (logLevel !== DiagLogLevel.NONE) {
    diag.setLogger(new DiagConsoleLogger(), logLevel);
  }

  const instrumentation = new RedisInstrumentation(options.redis);

  if (options.tracerProvider) {
    instrumentation.setTracerProvider(options.tracerProvider);
  }

  running.redis = instrumentation;
  diag.debug('redis command tracing started', instrumentation.getConfig());

  return instrumentation;
};

export const stop = () => {
  if (running.redis) {
    running.redis.disable();
    running.redis = null;
  }
};
