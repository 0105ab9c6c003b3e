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
  Attributes,
  context,
  Context,
  createContextKey,
} from '@opentelemetry/api';

const REDIS_ATTRIBUTES_KEY = createContextKey(
  'otel-redis-commands redis attributes'
);

function isAttributes(value: unknown): value is Attributes {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getRedisContextAttributes(ctx: Context): Attributes {
  const value = ctx.getValue(REDIS_ATTRIBUTES_KEY);
  return isAttributes(value) ? value : {};
}

/**
 * Runs `fn` with extra attributes attached to every Redis span started
 * within it. Nested calls merge, with the innermost keys taking precedence.
 */
export function withRedisAttributes<T>(attributes: Attributes, fn: () => T): T {
  const active = context.active();
  const merged = { ...getRedisContextAttributes(active), ...attributes };
  return context.with(active.setValue(REDIS_ATTRIBUTES_KEY, merged), fn);
}
