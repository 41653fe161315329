/**
 * Minimal cost API smoke test script
 * Run with: npm run smoke (requires the API server running, default port 5050)
 */

const API_BASE = process.env.COST_API_URL || 'http://localhost:5050';

interface TestResult {
  name: string;
  passed: boolean;
  error?: string;
}

const results: TestResult[] = [];

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    results.push({ name, passed: true });
    console.log(`✓ ${name}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    results.push({ name, passed: false, error: message });
    console.log(`✗ ${name}: ${message}`);
  }
}

async function fetchJson(url: string, options?: RequestInit): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options?.headers,
    },
  });
  return { status: response.status, body: await response.json() };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function runTests(): Promise<void> {
  console.log('\n=== Cost API Smoke Tests ===\n');

  await test('GET /health returns ok:true', async () => {
    const { body } = await fetchJson(`${API_BASE}/health`);
    if (!isRecord(body) || body.ok !== true) throw new Error('Expected ok:true');
  });

  let monthlyBefore = 0;
  await test('GET /api/cost/summary has budget and rate', async () => {
    const { body } = await fetchJson(`${API_BASE}/api/cost/summary`);
    if (!isRecord(body) || !isRecord(body.budget) || !isRecord(body.monthly)) {
      throw new Error('Expected summary shape');
    }
    if (typeof body.exchange_rate !== 'number') throw new Error('Expected numeric exchange_rate');
    monthlyBefore = typeof body.monthly.usd === 'number' ? body.monthly.usd : 0;
  });

  await test('POST /api/cost/usage records a call', async () => {
    const { status, body } = await fetchJson(`${API_BASE}/api/cost/usage`, {
      method: 'POST',
      body: JSON.stringify({ model: 'gpt-4o-mini', input_tokens: 1000, output_tokens: 1000, project: 'smoke-test' }),
    });
    if (status !== 201) throw new Error(`Expected 201, got ${status}`);
    if (!isRecord(body) || body.cost_usd !== 0.00075) throw new Error('Expected cost_usd 0.00075');
  });

  await test('monthly total grows after recording', async () => {
    const { body } = await fetchJson(`${API_BASE}/api/cost/summary`);
    if (!isRecord(body) || !isRecord(body.monthly) || typeof body.monthly.usd !== 'number') {
      throw new Error('Expected summary shape');
    }
    if (body.monthly.usd <= monthlyBefore) throw new Error('Monthly total did not grow');
  });

  await test('POST /api/cost/usage rejects a bad body', async () => {
    const { status } = await fetchJson(`${API_BASE}/api/cost/usage`, {
      method: 'POST',
      body: JSON.stringify({ model: '', input_tokens: -1 }),
    });
    if (status !== 400) throw new Error(`Expected 400, got ${status}`);
  });

  for (const endpoint of ['/api/cost/models', '/api/cost/projects', '/api/cost/history', '/api/cost/monthly']) {
    await test(`GET ${endpoint} returns 200`, async () => {
      const { status } = await fetchJson(`${API_BASE}${endpoint}`);
      if (status !== 200) throw new Error(`Expected 200, got ${status}`);
    });
  }

  const failed = results.filter((r) => !r.passed);
  console.log(`\n${results.length - failed.length}/${results.length} passed\n`);
  if (failed.length > 0) process.exit(1);
}

runTests().catch((error) => {
  console.error('Smoke tests crashed:', error);
  process.exit(1);
});
