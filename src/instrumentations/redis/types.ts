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
import type { Attributes, Span } from '@opentelemetry/api';
import type { InstrumentationConfig } from '@opentelemetry/instrumentation';

export type CommandName = string;

export type CommandArgument =
  | string
  | number
  | bigint
  | Buffer
  | null
  | undefined
  | CommandArgument[];

/** `[operation, arg1, arg2, ...]`, e.g. `['set', 'key', 'value']`. */
export type Command = [CommandName, ...CommandArgument[]];

/** A command wrapped once more by queued or transactional submission. */
export type QueuedCommand = [Command];

export type CommandEntry = Command | QueuedCommand;

/**
 * Examples of batches handed to the client:
 *
 *   single:    [['set', 'K', 'x']]
 *   pipelined: [['set', 'v1', '0'], ['incr', 'v1'], ['get', 'v1']]
 *   queued:    [[['set', 'v1', '0']], [['incr', 'v1']], [['get', 'v1']]]
 */
export type CommandBatch = CommandEntry[];

export type BatchShape =
  | { kind: 'singleton'; command: Command }
  | { kind: 'pipelined'; commands: Command[] }
  | { kind: 'queued'; commands: Command[] };

/**
 * Whatever the client returned, or a promise of it. An `Error` in any
 * position is a command error reported as data, not thrown.
 */
export type Reply = unknown;

export type DbStatementMode = 'omit' | 'obfuscate' | 'raw';

export interface ConnectionOptions {
  host?: string;
  port?: number;
  /** Selected database index, 0 being the default database. */
  db?: number;
}

export interface Pipeline {
  commands: CommandBatch;
}

export interface RedisClient {
  options: ConnectionOptions;
  process(commands: CommandBatch): Reply;
  /** Replies are positionally aligned with the pipeline's commands. */
  callPipelined(pipeline: Pipeline | CommandBatch): Reply;
}

export type RedisResponseHook = (span: Span, reply: Reply) => void;

export interface RedisInstrumentationConfig extends InstrumentationConfig {
  /**
   * `omit` leaves db.statement out, `obfuscate` replaces every argument
   * with `?` and `raw` records the arguments as sent.
   */
  dbStatement?: DbStatementMode;

  /** Record db.set_value_size_bytes and db.retrieved_value_size_bytes. */
  recordValueSize?: boolean;

  /** Recorded as peer.service when set. */
  peerService?: string;

  /** Create spans for commands issued without an active parent span. */
  traceRootSpans?: boolean;

  /** Static attributes added to every span. */
  attributes?: Attributes;

  /** hook for adding custom attributes using the reply */
  responseHook?: RedisResponseHook;

  /**
   * Setting `suppressInternalInstrumentation` to `true` runs the client call
   * with tracing suppressed, so socket-level instrumentations create no spans
   * underneath the command span.
   */
  suppressInternalInstrumentation?: boolean;
}

export type RedisAttributeConfig = Pick<
  RedisInstrumentationConfig,
  'dbStatement' | 'recordValueSize' | 'peerService' | 'attributes'
>;
