import { randomUUID } from 'node:crypto';

import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';

import type { PipelineErrorKind, PipelineResponse } from '../../shared/types';
import { MAX_PAGE, MAX_PAGE_SIZE, REQUEST_ID_HEADER } from '../../shared/constants';
import { REQUEST_MESSAGES } from '../../shared/constants/messages';
import {
  getPipeline,
  isPipelineFailure,
  pipelineFailure,
  type Nl2SqlPipeline,
  type RequestOptions,
} from '../agents/nl2sql-agent';
import { ConfigurationError } from '../errors';
import { logger } from '../lib/logger';

const STATUS_FOR: Record<PipelineErrorKind, number> = {
  invalid_request: 400,
  exhausted_retries: 422,
  cancelled: 499,
  configuration_error: 500,
  internal_error: 500,
};

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

const generateBody = z.object({
  question: z.string(),
  page: z.number().int().min(1).max(MAX_PAGE).optional(),
  pageSize: z.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
});
const executeBody = z.object({ sql: z.string() });

/** Honour a well-formed incoming request id, otherwise mint one. */
export function requestIdFor(req: NextRequest): string {
  const incoming = req.headers.get(REQUEST_ID_HEADER)?.trim();
  return incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();
}

function respond(response: PipelineResponse, correlationId: string): NextResponse {
  const status = isPipelineFailure(response) ? STATUS_FOR[response.error.kind] : 200;
  return NextResponse.json(response, { status, headers: { [REQUEST_ID_HEADER]: correlationId } });
}

async function handle<T>(
  req: NextRequest,
  schema: z.ZodType<T>,
  messageFor: (error: z.ZodError) => string,
  run: (pipeline: Nl2SqlPipeline, body: T, options: RequestOptions) => Promise<PipelineResponse>,
): Promise<NextResponse> {
  const correlationId = requestIdFor(req);

  let raw: unknown;
  try {
    raw = await req.json();
  } catch {
    return respond(pipelineFailure('invalid_request', REQUEST_MESSAGES.invalidBody, correlationId), correlationId);
  }
  const body = schema.safeParse(raw);
  if (!body.success) {
    return respond(pipelineFailure('invalid_request', messageFor(body.error), correlationId), correlationId);
  }

  try {
    const response = await run(getPipeline(), body.data, { signal: req.signal, correlationId });
    return respond(response, correlationId);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error('Pipeline configuration is invalid', { correlationId, issues: error.issues });
      return respond(pipelineFailure('configuration_error', REQUEST_MESSAGES.configuration, correlationId), correlationId);
    }
    // Don't leak internal errors to client
    logger.error('Query request failed', {
      correlationId,
      error: error instanceof Error ? error.message : String(error),
    });
    return respond(pipelineFailure('internal_error', REQUEST_MESSAGES.internal, correlationId), correlationId);
  }
}

function generateMessage(error: z.ZodError): string {
  const fields = error.issues.map((issue) => issue.path[0]);
  if (fields.includes('question')) return REQUEST_MESSAGES.emptyQuestion;
  if (fields.includes('page')) return REQUEST_MESSAGES.pageOutOfRange(MAX_PAGE);
  if (fields.includes('pageSize')) return REQUEST_MESSAGES.pageSizeOutOfRange(MAX_PAGE_SIZE);
  return REQUEST_MESSAGES.emptyQuestion;
}

/** POST /api/generate `{ question, page?, pageSize? }` */
export async function handleGenerate(req: NextRequest): Promise<NextResponse> {
  return handle(req, generateBody, generateMessage, (pipeline, body, options) =>
    pipeline.generateAndExecute(body.question, { ...options, page: body.page, pageSize: body.pageSize }),
  );
}

/** POST /api/execute `{ sql }` */
export async function handleExecute(req: NextRequest): Promise<NextResponse> {
  return handle(req, executeBody, () => REQUEST_MESSAGES.emptySql, (pipeline, body, options) =>
    pipeline.executeValidated(body.sql, options),
  );
}
