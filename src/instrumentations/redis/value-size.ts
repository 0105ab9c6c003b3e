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
  classifyBatch,
  containsAuth,
  isTrackedCommand,
  normalizeCommand,
} from './command';
import type { CommandBatch, CommandName, Reply } from './types';

export const SET_VALUE_SIZE_COMMANDS: readonly CommandName[] = ['set'];
export const RETRIEVED_VALUE_SIZE_COMMANDS: readonly CommandName[] = [
  'get',
  'mget',
];

function digitCount(value: bigint): number {
  return (value < BigInt(0) ? -value : value).toString().length;
}

/**
 * Size of a value as it travels over the wire. Numbers count the characters
 * of their decimal form rather than their storage width. Command errors
 * count as 0.
 */
export function byteSize(value: unknown): number {
  if (value instanceof Error) {
    return 0;
  }

  if (typeof value === 'string') {
    return Buffer.byteLength(value, 'utf8');
  }

  if (value instanceof Uint8Array) {
    return value.byteLength;
  }

  if (Array.isArray(value)) {
    return value.reduce((sum: number, item: unknown) => sum + byteSize(item), 0);
  }

  if (typeof value === 'bigint') {
    return digitCount(value);
  }

  if (typeof value === 'number') {
    if (Number.isInteger(value)) {
      return digitCount(BigInt(value));
    }

    return Buffer.byteLength(String(value), 'utf8');
  }

  return 0;
}

/**
 * Sum of the sizes of the values being set by tracked commands. The last
 * argument of a tracked command is taken to be the value.
 */
export function sentValueSize(
  batch: CommandBatch,
  trackedCommands: readonly CommandName[]
): number {
  const commands = batch.map(normalizeCommand);

  if (containsAuth(commands)) {
    return 0;
  }

  let valueSize = 0;
  for (const command of commands) {
    if (command.length < 2 || !isTrackedCommand(command, trackedCommands)) {
      continue;
    }

    valueSize += byteSize(command[command.length - 1]);
  }

  return valueSize;
}

function replyAt(reply: Reply, index: number): Reply {
  return Array.isArray(reply) ? reply[index] : undefined;
}

/**
 * Sum of the sizes of replies to tracked commands. Pipelined and queued
 * batches are split into single-command batches matched positionally with
 * the reply array.
 */
export function retrievedValueSize(
  reply: Reply,
  batch: CommandBatch,
  trackedCommands: readonly CommandName[]
): number {
  const shape = classifyBatch(batch);

  if (shape.kind === 'singleton') {
    return isTrackedCommand(shape.command, trackedCommands)
      ? byteSize(reply)
      : 0;
  }

  return shape.commands.reduce(
    (valueSize, command, i) =>
      valueSize +
      retrievedValueSize(replyAt(reply, i), [command], trackedCommands),
    0
  );
}
