import { NextRequest, NextResponse } from 'next/server';

import { logger } from '../lib/logger';
import { listAuditRecords } from '../middleware/audit';

const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/** GET /api/audit?correlationId=… */
export async function handleAuditTrail(req: NextRequest): Promise<NextResponse> {
  const url = new URL(req.url);
  const correlationId = url.searchParams.get('correlationId')?.trim() ?? '';

  if (!CORRELATION_ID_PATTERN.test(correlationId)) {
    return NextResponse.json({ error: 'correlationId query parameter is required' }, { status: 400 });
  }

  try {
    const records = await listAuditRecords(correlationId);
    if (records.length === 0) {
      return NextResponse.json({ error: 'No audit records for this correlationId' }, { status: 404 });
    }
    return NextResponse.json({ correlationId, records });
  } catch (error) {
    logger.error('Audit trail lookup failed', {
      correlationId,
      error: error instanceof Error ? error.message : String(error),
    });
    return NextResponse.json({ error: 'Failed to load audit trail' }, { status: 500 });
  }
}
