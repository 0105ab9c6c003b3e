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
  context,
  isSpanContextValid,
  Span,
  SpanKind,
  SpanStatusCode,
  trace,
} from '@opentelemetry/api';
import { suppressTracing } from '@opentelemetry/core';
import {
  InstrumentationBase,
  InstrumentationModuleDefinition,
  isWrapped,
  safeExecuteInTheMiddle,
} from '@opentelemetry/instrumentation';
import isPromise from 'is-promise';
import { VERSION } from '../../version';
import { buildSpanAttributes, spanNameFor } from './attributes';
import { getRedisContextAttributes } from './context';
import { _setDefaultOptions } from './options';
import {
  ATTR_DB_RETRIEVED_VALUE_SIZE_BYTES,
  PIPELINED_SPAN_NAME,
} from './semconv';
import type {
  CommandBatch,
  Pipeline,
  RedisClient,
  RedisInstrumentationConfig,
  Reply,
} from './types';
import {
  RETRIEVED_VALUE_SIZE_COMMANDS,
  retrievedValueSize,
} from './value-size';

function pipelineCommands(pipeline: Pipeline | CommandBatch): CommandBatch {
  return Array.isArray(pipeline) ? pipeline : pipeline.commands;
}

export function setSpanWithError(span: Span, err: Error) {
  span.recordException(err);
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: err.message,
  });
}

/**
 * Traces the single-command and pipelined execution entry points of a Redis
 * client. Clients are wrapped explicitly with `instrumentClient`.
 */
export class RedisInstrumentation extends InstrumentationBase<RedisInstrumentationConfig> {
  constructor(config: RedisInstrumentationConfig = {}) {
    super(
      'otel-redis-commands-instrumentation-redis',
      VERSION,
      _setDefaultOptions(config)
    );
  }

  override setConfig(config: RedisInstrumentationConfig = {}): void {
    super.setConfig(_setDefaultOptions(config));
  }

  protected init(): InstrumentationModuleDefinition[] {
    return [];
  }

  instrumentClient<T extends RedisClient>(client: T): T {
    const target: RedisClient = client;

    if (isWrapped(target.process)) {
      this._unwrap(target, 'process');
    }
    this._wrap(target, 'process', this._patchProcess());

    if (isWrapped(target.callPipelined)) {
      this._unwrap(target, 'callPipelined');
    }
    this._wrap(target, 'callPipelined', this._patchCallPipelined());

    this._diag.debug('patched redis client');
    return client;
  }

  uninstrumentClient(client: RedisClient) {
    if (isWrapped(client.process)) {
      this._unwrap(client, 'process');
    }
    if (isWrapped(client.callPipelined)) {
      this._unwrap(client, 'callPipelined');
    }
  }

  private _shouldTrace(): boolean {
    if (this.getConfig().traceRootSpans !== false) {
      return true;
    }

    const parent = trace.getSpanContext(context.active());
    return parent !== undefined && isSpanContextValid(parent);
  }

  private _startSpan(
    name: string,
    client: RedisClient,
    commands: CommandBatch
  ): Span {
    const attributes = buildSpanAttributes(
      commands,
      client.options,
      this.getConfig(),
      getRedisContextAttributes(context.active())
    );

    return this.tracer.startSpan(name, {
      kind: SpanKind.CLIENT,
      attributes,
    });
  }

  private _patchProcess() {
    const instrumentation = this;
    return (original: RedisClient['process']): RedisClient['process'] => {
      return function patchedProcess(this: RedisClient, commands: CommandBatch) {
        // Multi-command batches reach process from callPipelined, which
        // already owns the span.
        if (
          !instrumentation.isEnabled() ||
          commands.length !== 1 ||
          !instrumentation._shouldTrace()
        ) {
          return original.call(this, commands);
        }

        const span = instrumentation._startSpan(
          spanNameFor(commands),
          this,
          commands
        );

        return instrumentation._traceCall(
          span,
          () => original.call(this, commands),
          (reply) => {
            if (reply instanceof Error) {
              setSpanWithError(span, reply);
            }

            if (instrumentation.getConfig().recordValueSize) {
              span.setAttribute(
                ATTR_DB_RETRIEVED_VALUE_SIZE_BYTES,
                retrievedValueSize(
                  reply,
                  commands,
                  RETRIEVED_VALUE_SIZE_COMMANDS
                )
              );
            }
          }
        );
      };
    };
  }

  private _patchCallPipelined() {
    const instrumentation = this;
    return (
      original: RedisClient['callPipelined']
    ): RedisClient['callPipelined'] => {
      return function patchedCallPipelined(
        this: RedisClient,
        pipeline: Pipeline | CommandBatch
      ) {
        if (!instrumentation.isEnabled() || !instrumentation._shouldTrace()) {
          return original.call(this, pipeline);
        }

        const commands = pipelineCommands(pipeline);
        const span = instrumentation._startSpan(
          PIPELINED_SPAN_NAME,
          this,
          commands
        );

        return instrumentation._traceCall(
          span,
          () => original.call(this, pipeline),
          (replies) => {
            if (instrumentation.getConfig().recordValueSize) {
              span.setAttribute(
                ATTR_DB_RETRIEVED_VALUE_SIZE_BYTES,
                retrievedValueSize(
                  replies,
                  commands,
                  RETRIEVED_VALUE_SIZE_COMMANDS
                )
              );
            }
          }
        );
      };
    };
  }

  private _callOriginal<T>(span: Span, originalFunction: () => T): T {
    const activeContextWithSpan = trace.setSpan(context.active(), span);
    const ctx = this.getConfig().suppressInternalInstrumentation
      ? suppressTracing(activeContextWithSpan)
      : activeContextWithSpan;
    return context.with(ctx, originalFunction);
  }

  private _traceCall(
    span: Span,
    traced: () => Reply,
    onReply: (reply: Reply) => void
  ): Reply {
    const finish = (reply: Reply): Reply => {
      onReply(reply);
      this._executeResponseHook(span, reply);
      span.end();
      return reply;
    };

    const fail = (err: unknown): never => {
      if (err instanceof Error) {
        setSpanWithError(span, err);
      } else {
        span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) });
      }
      span.end();
      throw err;
    };

    let result: Reply;
    try {
      result = this._callOriginal(span, traced);
    } catch (err) {
      return fail(err);
    }

    if (isPromise(result)) {
      return Promise.resolve(result).then(finish, fail);
    }

    return finish(result);
  }

  private _executeResponseHook(span: Span, reply: Reply) {
    const hook = this.getConfig().responseHook;
    if (hook === undefined) {
      return;
    }

    safeExecuteInTheMiddle(
      () => hook(span, reply),
      (e) => {
        if (e) {
          this._diag.error('redis instrumentation: responseHook error', e);
        }
      },
      true
    );
  }
}
