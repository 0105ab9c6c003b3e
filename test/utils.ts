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
import { isDeepStrictEqual } from 'util';

const isConfigVarEntry = (key: string) => {
  const lowercased = key.toLowerCase();
  return lowercased.includes('otel_');
};

/*
  Has a side-effect of deleting environment variables in the running process.
  To be used in tests to make sure:
  1. that we don't depend on the actual environment in the tests.
  2. there are no leaking setup between tests;
*/
export const cleanEnvironment = () => {
  Object.keys(process.env)
    .filter(isConfigVarEntry)
    .forEach((key) => {
      delete process.env[key];
    });
};

interface CallRecorder {
  mock: { calls: { arguments: unknown[] }[] };
}

export function calledWithExactly(fn: CallRecorder, ...expected: unknown[]) {
  const calls = fn.mock.calls.map((call) => call.arguments);
  assert(
    calls.some((args) => isDeepStrictEqual(args, expected)),
    `Expected a call with ${JSON.stringify(expected)}, got ${JSON.stringify(
      calls
    )}`
  );
}
