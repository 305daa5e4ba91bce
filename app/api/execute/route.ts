import { NextRequest } from 'next/server';
import { handleExecute } from '../../../src/server/routes/query';

export async function POST(request: NextRequest) {
  return handleExecute(request);
}
