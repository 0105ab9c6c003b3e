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
import { describe, it } from 'node:test';
import {
  byteSize,
  RETRIEVED_VALUE_SIZE_COMMANDS,
  retrievedValueSize,
  SET_VALUE_SIZE_COMMANDS,
  sentValueSize,
} from '../../../src/instrumentations/redis';
import type {
  Command,
  CommandBatch,
  QueuedCommand,
} from '../../../src/instrumentations/redis';
import { ReplyError } from './utils';

const pipelined: Command[] = [
  ['set', 'v1', '0'],
  ['incr', 'v1'],
  ['get', 'v1'],
];

const queued: CommandBatch = pipelined.map(
  (command): QueuedCommand => [command]
);

describe('redis value sizes', () => {
  describe('byteSize', () => {
    it('counts string bytes, not characters', () => {
      assert.strictEqual(byteSize('abc'), 3);
      assert.strictEqual(byteSize('héllo'), 6);
      assert.strictEqual(byteSize('😀'), 4);
      assert.strictEqual(byteSize(''), 0);
    });

    it('counts buffer bytes', () => {
      assert.strictEqual(byteSize(Buffer.from([1, 2, 3])), 3);
    });

    it('sums arrays recursively', () => {
      assert.strictEqual(byteSize(['a', 'bb']), byteSize('a') + byteSize('bb'));
      assert.strictEqual(byteSize([['a', ['bb']], 'ccc']), 6);
      assert.strictEqual(byteSize([]), 0);
    });

    it('counts the decimal digits of integers', () => {
      assert.strictEqual(byteSize(12345), 5);
      assert.strictEqual(byteSize(0), 1);
      assert.strictEqual(byteSize(-42), 2);
      assert.strictEqual(byteSize(BigInt('12345678901234567890')), 20);
    });

    it('counts the string form of floats', () => {
      assert.strictEqual(byteSize(1.5), 3);
      assert.strictEqual(byteSize(0.25), 4);
      assert.strictEqual(byteSize(-0.5), 4);
    });

    it('counts errors and missing values as zero', () => {
      assert.strictEqual(byteSize(new ReplyError('ERR wrong type')), 0);
      assert.strictEqual(byteSize(null), 0);
      assert.strictEqual(byteSize(undefined), 0);
      assert.strictEqual(byteSize([new ReplyError('ERR'), 'ok']), 2);
    });
  });

  describe('sentValueSize', () => {
    it('sums the last argument of tracked commands', () => {
      assert.strictEqual(
        sentValueSize(pipelined, SET_VALUE_SIZE_COMMANDS),
        byteSize('0')
      );
      assert.strictEqual(
        sentValueSize(
          [
            ['set', 'a', 'xyz'],
            ['get', 'a'],
            ['SET', 'b', 'héllo'],
          ],
          SET_VALUE_SIZE_COMMANDS
        ),
        9
      );
    });

    it('handles queued commands', () => {
      assert.strictEqual(sentValueSize(queued, SET_VALUE_SIZE_COMMANDS), 1);
    });

    it('is zero for untracked commands', () => {
      assert.strictEqual(
        sentValueSize([['get', 'k']], SET_VALUE_SIZE_COMMANDS),
        0
      );
      assert.strictEqual(sentValueSize([['set']], SET_VALUE_SIZE_COMMANDS), 0);
      assert.strictEqual(sentValueSize([], SET_VALUE_SIZE_COMMANDS), 0);
    });

    it('is zero for any batch containing AUTH', () => {
      assert.strictEqual(
        sentValueSize([['auth', 'test-secret']], SET_VALUE_SIZE_COMMANDS),
        0
      );
      assert.strictEqual(
        sentValueSize(
          [
            ['set', 'k', 'value'],
            ['auth', 'test-secret'],
          ],
          SET_VALUE_SIZE_COMMANDS
        ),
        0
      );
      assert.strictEqual(
        sentValueSize(
          [[['set', 'k', 'value']], [['AUTH', 'test-secret']]],
          SET_VALUE_SIZE_COMMANDS
        ),
        0
      );
    });
  });

  describe('retrievedValueSize', () => {
    it('sizes the reply of a tracked single command', () => {
      const batch: CommandBatch = [['set', 'k', 'v']];

      assert.strictEqual(
        retrievedValueSize('OK', batch, RETRIEVED_VALUE_SIZE_COMMANDS),
        0
      );
      assert.strictEqual(
        retrievedValueSize('OK', batch, SET_VALUE_SIZE_COMMANDS),
        byteSize('OK')
      );
    });

    it('sizes an MGET reply', () => {
      assert.strictEqual(
        retrievedValueSize(
          ['xx', null, 'yyy'],
          [['mget', 'a', 'b', 'c']],
          RETRIEVED_VALUE_SIZE_COMMANDS
        ),
        5
      );
    });

    it('matches pipelined replies by position', () => {
      const reply = ['OK', 1, '1'];

      assert.strictEqual(
        retrievedValueSize(reply, pipelined, ['get']),
        byteSize('1')
      );
      assert.strictEqual(retrievedValueSize(reply, pipelined, ['get', 'incr']), 2);
    });

    it('gives the same total for queued and pipelined batches', () => {
      const reply = ['OK', 1, 'héllo'];

      for (const tracked of [['get'], ['set', 'incr'], ['set', 'get']]) {
        assert.strictEqual(
          retrievedValueSize(reply, queued, tracked),
          retrievedValueSize(reply, pipelined, tracked)
        );
      }
    });

    it('counts command errors as zero', () => {
      assert.strictEqual(
        retrievedValueSize(
          new ReplyError('ERR'),
          [['get', 'k']],
          RETRIEVED_VALUE_SIZE_COMMANDS
        ),
        0
      );
      assert.strictEqual(
        retrievedValueSize(
          ['OK', new ReplyError('ERR'), 'abc'],
          [
            ['set', 'k', 'v'],
            ['get', 'h'],
            ['get', 'k'],
          ],
          RETRIEVED_VALUE_SIZE_COMMANDS
        ),
        3
      );
    });

    it('is zero when replies are missing', () => {
      assert.strictEqual(retrievedValueSize(['OK'], pipelined, ['get']), 0);
      assert.strictEqual(retrievedValueSize(undefined, pipelined, ['get']), 0);
      assert.strictEqual(retrievedValueSize([], [], ['get']), 0);
    });
  });
});
