import { NextResponse } from 'next/server';

import { getConfig, type PipelineConfig } from '../config';
import { healthCheck } from '../db/pool';
import { ConfigurationError } from '../errors';
import { hasApiKey } from '../llm';

export async function handleHealth(): Promise<NextResponse> {
  let config: PipelineConfig;
  try {
    config = getConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return NextResponse.json({ status: 'error', message: 'configuration invalid', issues: error.issues }, { status: 503 });
    }
    throw error;
  }

  const database = await healthCheck();
  const llmConfigured = hasApiKey(config.llm.provider, config.llm.apiKey);

  if (!database) {
    return NextResponse.json(
      { status: 'error', message: 'database unreachable', database, llmConfigured },
      { status: 503 },
    );
  }

  return NextResponse.json(
    { status: llmConfigured ? 'ok' : 'degraded', database, llmConfigured, llmProvider: config.llm.provider },
    { status: 200 },
  );
}
