/**
 * Tool plumbing
 *
 * A tool validates its input with zod, resolves it through the fetch
 * orchestrator (which checks the raw upstream envelope against the tool's
 * item schema before caching it) and shapes the envelope into the JSON it
 * returns. Failures come back as data, never as
 * a rejected promise.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { MediatorErrorCode } from '../api/errors.js';
import {
  isRetryLater,
  toMediatorError,
  TransportFailureError,
  zodErrorToValidationError,
} from '../api/errors.js';
import type { FetchOrchestrator } from '../core/fetch-orchestrator.js';
import type { QueryFamily, QueryParams, UpstreamCall } from '../types/query.js';
import type { ApiSportsEnvelope } from '../types/schemas/api-sports.js';

export interface ToolFailure {
  error: string;
  code: MediatorErrorCode;
  retry_later: boolean;
  request_id: string;
}

export type ToolSuccess<TData extends object> = TData & { request_id: string };

export type ToolResult<TData extends object> = ToolSuccess<TData> | ToolFailure;

export interface ToolInvokeOptions {
  signal?: AbortSignal;
}

export interface ToolDefinition<TSchema extends z.ZodTypeAny, TData extends object> {
  name: string;
  description: string;
  inputSchema: TSchema;
  handler: (input: unknown, options?: ToolInvokeOptions) => Promise<ToolResult<TData>>;
}

export type AnyToolDefinition = ToolDefinition<z.ZodTypeAny, object>;

/**
 * What every tool needs to reach the upstream
 */
export interface ToolContext {
  orchestrator: FetchOrchestrator<ApiSportsEnvelope>;
  upstream: UpstreamCall<ApiSportsEnvelope>;
  logger?: Logger;

  /** Request id source (defaults to randomUUID) */
  requestId?: () => string;
}

export interface ToolSpec<TSchema extends z.ZodTypeAny, TData extends object> {
  name: string;
  description: string;
  inputSchema: TSchema;
  family: QueryFamily;
  toParams: (input: z.infer<TSchema>) => QueryParams;

  /** Runs on every upstream envelope before it is cached */
  validate: (envelope: ApiSportsEnvelope) => void;

  shape: (envelope: ApiSportsEnvelope, input: z.infer<TSchema>) => TData;
}

export function isToolFailure<TData extends object>(result: ToolResult<TData>): result is ToolFailure {
  return 'error' in result && 'retry_later' in result;
}

/**
 * Parse the `response` array of an envelope item by item.
 *
 * @throws {TransportFailureError} when the upstream sent something else
 */
export function parseResponseItems<TItem extends z.ZodTypeAny>(
  envelope: ApiSportsEnvelope,
  itemSchema: TItem,
  what: string
): Array<z.infer<TItem>> {
  const parsed = z.array(itemSchema).safeParse(envelope.response ?? []);
  if (!parsed.success) {
    throw new TransportFailureError(`Upstream returned malformed ${what} data`, {
      issues: parsed.error.issues.length,
    });
  }
  return parsed.data;
}

/**
 * Envelope check that every `response` item matches `itemSchema`.
 */
export function validateItems<TItem extends z.ZodTypeAny>(
  itemSchema: TItem,
  what: string
): (envelope: ApiSportsEnvelope) => void {
  return (envelope) => {
    parseResponseItems(envelope, itemSchema, what);
  };
}

export function defineTool<TSchema extends z.ZodTypeAny, TData extends object>(
  context: ToolContext,
  tool: ToolSpec<TSchema, TData>
): ToolDefinition<TSchema, TData> {
  const nextId = context.requestId ?? randomUUID;
  const logger = context.logger?.child({ tool: tool.name });

  const handler = async (input: unknown, options: ToolInvokeOptions = {}): Promise<ToolResult<TData>> => {
    const requestId = nextId();

    const parsed = tool.inputSchema.safeParse(input ?? {});
    if (!parsed.success) {
      const error = zodErrorToValidationError(parsed.error);
      logger?.info({ requestId, err: error }, 'Rejected invalid tool input');
      return failure(error.code, error.message, false, requestId);
    }

    const args: z.infer<TSchema> = parsed.data;
    const params = tool.toParams(args);
    logger?.info({ requestId, params }, 'Tool invoked');

    try {
      const envelope = await context.orchestrator.fetch(tool.family, params, context.upstream, {
        signal: options.signal,
        validate: tool.validate,
      });
      const data = tool.shape(envelope, args);
      logger?.debug({ requestId }, 'Tool completed');
      return { ...data, request_id: requestId };
    } catch (err) {
      const error = toMediatorError(err);
      const retryLater = isRetryLater(error);
      if (retryLater) {
        logger?.warn({ requestId, code: error.code, err: error }, 'Tool failed, retry later');
      } else {
        logger?.error({ requestId, code: error.code, err: error }, 'Tool failed');
      }
      return failure(error.code, error.message, retryLater, requestId);
    }
  };

  return {
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    handler,
  };
}

function failure(
  code: MediatorErrorCode,
  message: string,
  retryLater: boolean,
  requestId: string
): ToolFailure {
  return {
    error: message,
    code,
    retry_later: retryLater,
    request_id: requestId,
  };
}
