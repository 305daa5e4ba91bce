import { handleHealth } from '../../../src/server/routes/health';

export const dynamic = 'force-dynamic';

export async function GET() {
  return handleHealth();
}
