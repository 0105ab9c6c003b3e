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
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import {
  InMemorySpanExporter,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { normalizeCommand } from '../../../src/instrumentations/redis';
import type {
  Command,
  CommandBatch,
  ConnectionOptions,
  Pipeline,
  RedisClient,
  RedisInstrumentation,
  Reply,
} from '../../../src/instrumentations/redis';

diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR);

export const exporter = new InMemorySpanExporter();
export const provider: NodeTracerProvider = new NodeTracerProvider({
  resource: resourceFromAttributes({
    [ATTR_SERVICE_NAME]: 'redis-commands-test',
  }),
  spanProcessors: [new SimpleSpanProcessor(exporter)],
});

export function getTestSpans() {
  return exporter.getFinishedSpans();
}

export function setInstrumentation(instr: RedisInstrumentation) {
  instr.setTracerProvider(provider);
}

export class ReplyError extends Error {}

export type Responder = (command: Command) => Reply;

/** Answers a handful of commands from an in-memory map. */
export function createStoreResponder(): Responder {
  const store = new Map<string, string>();

  return (command) => {
    const [name, ...args] = command;
    const key = String(args[0]);

    switch (name.toLowerCase()) {
      case 'set':
        store.set(key, String(args[1]));
        return 'OK';
      case 'get':
        return store.get(key) ?? null;
      case 'mget':
        return args.map((k) => store.get(String(k)) ?? null);
      case 'incr': {
        const next = Number(store.get(key) ?? '0') + 1;
        store.set(key, String(next));
        return next;
      }
      case 'auth':
        return 'OK';
      case 'disconnect':
        throw new Error('Connection lost');
      default:
        return new ReplyError(`ERR unknown command '${name}'`);
    }
  };
}

export class FakeRedisClient implements RedisClient {
  options: ConnectionOptions = { host: 'localhost', port: 6379, db: 0 };
  async = false;

  constructor(private respond: Responder = createStoreResponder()) {}

  process(commands: CommandBatch): Reply {
    return this._run(() => {
      const replies = commands.map((entry) =>
        this.respond(normalizeCommand(entry))
      );
      return commands.length === 1 ? replies[0] : replies;
    });
  }

  callPipelined(pipeline: Pipeline | CommandBatch): Reply {
    const commands = Array.isArray(pipeline) ? pipeline : pipeline.commands;
    return this._run(() =>
      commands.map((entry) => this.respond(normalizeCommand(entry)))
    );
  }

  private _run(execute: () => Reply): Reply {
    if (this.async) {
      // a throw inside the executor becomes a rejection
      return new Promise<Reply>((resolve) => resolve(execute()));
    }

    return execute();
  }
}
