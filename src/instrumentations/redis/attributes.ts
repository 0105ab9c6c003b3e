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
import { Attributes } from '@opentelemetry/api';
import { classifyBatch } from './command';
import {
  ATTR_DB_SET_VALUE_SIZE_BYTES,
  DBSYSTEMVALUES_REDIS,
  PIPELINED_SPAN_NAME,
  SEMATTRS_DB_REDIS_DATABASE_INDEX,
  SEMATTRS_DB_STATEMENT,
  SEMATTRS_DB_SYSTEM,
  SEMATTRS_NET_PEER_NAME,
  SEMATTRS_NET_PEER_PORT,
  SEMATTRS_PEER_SERVICE,
} from './semconv';
import { formatStatement } from './statement';
import type {
  CommandBatch,
  ConnectionOptions,
  RedisAttributeConfig,
} from './types';
import { SET_VALUE_SIZE_COMMANDS, sentValueSize } from './value-size';

export function spanNameFor(batch: CommandBatch): string {
  const shape = classifyBatch(batch);

  if (shape.kind === 'singleton') {
    return String(shape.command[0]).toUpperCase();
  }

  return PIPELINED_SPAN_NAME;
}

export function buildSpanAttributes(
  batch: CommandBatch,
  connection: ConnectionOptions,
  config: RedisAttributeConfig,
  extraAttributes: Attributes = {}
): Attributes {
  const attributes: Attributes = {
    [SEMATTRS_DB_SYSTEM]: DBSYSTEMVALUES_REDIS,
  };

  if (connection.host !== undefined) {
    attributes[SEMATTRS_NET_PEER_NAME] = connection.host;
  }
  if (connection.port !== undefined) {
    attributes[SEMATTRS_NET_PEER_PORT] = connection.port;
  }

  // 0 is the default database and is not worth recording
  if (connection.db) {
    attributes[SEMATTRS_DB_REDIS_DATABASE_INDEX] = connection.db;
  }

  if (config.peerService) {
    attributes[SEMATTRS_PEER_SERVICE] = config.peerService;
  }

  Object.assign(attributes, config.attributes, extraAttributes);

  const statement = formatStatement(batch, config.dbStatement ?? 'obfuscate');
  if (statement !== undefined) {
    attributes[SEMATTRS_DB_STATEMENT] = statement;
  }

  if (config.recordValueSize) {
    attributes[ATTR_DB_SET_VALUE_SIZE_BYTES] = sentValueSize(
      batch,
      SET_VALUE_SIZE_COMMANDS
    );
  }

  return attributes;
}
