import { NextRequest } from 'next/server';
import { handleAuditTrail } from '../../../src/server/routes/audit';

export async function GET(request: NextRequest) {
  return handleAuditTrail(request);
}
