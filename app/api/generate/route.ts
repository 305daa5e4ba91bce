import { NextRequest } from 'next/server';
import { handleGenerate } from '../../../src/server/routes/query';

export async function POST(request: NextRequest) {
  return handleGenerate(request);
}
