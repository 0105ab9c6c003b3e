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
import type {
  BatchShape,
  Command,
  CommandBatch,
  CommandEntry,
  CommandName,
  QueuedCommand,
} from './types';

// Commands submitted through a queue or a transaction carry an extra level
// of array nesting: [[['set', 'v1', '0']], [['incr', 'v1']]].
export function isQueuedCommand(entry: CommandEntry): entry is QueuedCommand {
  return Array.isArray(entry) && Array.isArray(entry[0]);
}

export function normalizeCommand(entry: CommandEntry): Command {
  return isQueuedCommand(entry) ? entry[0] : entry;
}

export function commandName(command: Command): string {
  return String(command[0]).toLowerCase();
}

export function isCommandNamed(command: Command, name: CommandName): boolean {
  return commandName(command) === name.toLowerCase();
}

export function isTrackedCommand(
  command: Command,
  trackedCommands: readonly CommandName[]
): boolean {
  return trackedCommands.some((name) => isCommandNamed(command, name));
}

export function containsAuth(commands: Command[]): boolean {
  return commands.some((command) => isCommandNamed(command, 'auth'));
}

export function classifyBatch(batch: CommandBatch): BatchShape {
  const commands = batch.map(normalizeCommand);

  if (commands.length === 1) {
    return { kind: 'singleton', command: commands[0] };
  }

  if (batch.length > 0 && batch.every(isQueuedCommand)) {
    return { kind: 'queued', commands };
  }

  return { kind: 'pipelined', commands };
}
