/**
 * Next.js startup hook: build the pipeline before the first request so an
 * invalid configuration stops the server instead of failing per request.
 */
export async function register() {
  if (process.env.NEXT_RUNTIME === 'nodejs') {
    const { getPipeline } = await import('./src/server/agents/nl2sql-agent');
    getPipeline();
  }
}
