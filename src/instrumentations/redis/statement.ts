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
import { containsAuth, normalizeCommand } from './command';
import type {
  Command,
  CommandArgument,
  CommandBatch,
  DbStatementMode,
} from './types';

export const MAX_STATEMENT_LENGTH = 500;

const REDACTED_AUTH_STATEMENT = 'AUTH ?';

function formatArgument(arg: CommandArgument): string {
  if (arg === null || arg === undefined) {
    return '';
  }

  if (Buffer.isBuffer(arg)) {
    return arg.toString('utf8');
  }

  if (Array.isArray(arg)) {
    return arg.map(formatArgument).join(' ');
  }

  return String(arg);
}

function renderCommand(
  command: Command,
  mode: Exclude<DbStatementMode, 'omit'>
): string {
  const [name, ...args] = command;
  const operation = String(name).toUpperCase();

  if (mode === 'obfuscate') {
    return operation + ' ?'.repeat(args.length);
  }

  return [operation, ...args.map(formatArgument)].join(' ');
}

/**
 * Renders one line per command. A single AUTH anywhere in the batch replaces
 * the whole statement with `AUTH ?`.
 */
export function renderStatement(
  batch: CommandBatch,
  mode: DbStatementMode
): string {
  if (mode === 'omit') {
    return '';
  }

  const commands = batch.map(normalizeCommand);

  if (containsAuth(commands)) {
    return REDACTED_AUTH_STATEMENT;
  }

  return commands.map((command) => renderCommand(command, mode)).join('\n');
}

// Lengths count code points, so a character outside the BMP is never split.
export function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }

  if (maxLength <= 3) {
    return chars.slice(0, maxLength).join('');
  }

  return `${chars.slice(0, maxLength - 3).join('')}...`;
}

// Lone surrogates in string arguments are replaced with U+FFFD.
export function safeEncode(text: string): string {
  return Buffer.from(text, 'utf8').toString('utf8');
}

export function formatStatement(
  batch: CommandBatch,
  mode: DbStatementMode
): string | undefined {
  if (mode === 'omit') {
    return undefined;
  }

  return safeEncode(
    truncate(renderStatement(batch, mode), MAX_STATEMENT_LENGTH)
  );
}
