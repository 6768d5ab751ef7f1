#!/usr/bin/env node
// ─── Integration Health Harness ──────────────────────────
// Validates a running sync backend's HTTP responses against the shared
// Zod schemas.
//
// Usage:
//   BACKEND_URL=http://localhost:4000 npx tsx scripts/healthcheck.ts
//
// Exit code 0 = all passed, non-zero = failures detected.

import { z } from 'zod';
import {
  BootstrapPayloadSchema,
  HealthResponseSchema,
  LogEventSchema,
  RoomListResponseSchema,
  StatusResponseSchema,
} from '@mapsync/shared';

const BACKEND_URL = process.env.BACKEND_URL || 'http://localhost:4000';
const ROOM = process.env.HEALTHCHECK_ROOM || 'healthcheck';
const TIMEOUT_MS = 10_000;

// ─── Test runner ─────────────────────────────────────────

interface TestResult {
  name: string;
  endpoint: string;
  passed: boolean;
  detail?: string;
}

const results: TestResult[] = [];

async function fetchJSON(path: string, init?: RequestInit): Promise<unknown> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), TIMEOUT_MS);
  try {
    const res = await fetch(`${BACKEND_URL}${path}`, {
      ...init,
      signal: controller.signal,
      headers: { 'Content-Type': 'application/json', ...(init?.headers ?? {}) },
    });
    if (!res.ok) throw new Error(`HTTP ${res.status}: ${await res.text()}`);
    return await res.json();
  } finally {
    clearTimeout(timer);
  }
}

async function runTest(name: string, endpoint: string, fn: () => Promise<void>) {
  try {
    await fn();
    results.push({ name, endpoint, passed: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    results.push({ name, endpoint, passed: false, detail: msg });
  }
}

// ─── Tests ───────────────────────────────────────────────

async function main() {
  console.log(`\n🔍 Map sync integration health check`);
  console.log(`   Backend: ${BACKEND_URL}  Room: ${ROOM}\n`);

  await runTest('Health endpoint', 'GET /health', async () => {
    HealthResponseSchema.parse(await fetchJSON('/health'));
  });

  await runTest('Status endpoint', 'GET /status', async () => {
    StatusResponseSchema.parse(await fetchJSON('/status'));
  });

  await runTest('Room list', 'GET /api/rooms', async () => {
    RoomListResponseSchema.parse(await fetchJSON('/api/rooms'));
  });

  await runTest('Publish full state', `PUT /api/rooms/${ROOM}/state`, async () => {
    const data = await fetchJSON(`/api/rooms/${ROOM}/state`, {
      method: 'PUT',
      body: JSON.stringify({
        marker_groups: [{ id: 'healthcheck', style: 'info', nodes: [{ lat: 0, lng: 0, label: 'Healthcheck' }] }],
      }),
    });
    z.object({ ok: z.literal(true), revisions: z.array(z.number().int()) }).passthrough().parse(data);
  });

  await runTest('Bootstrap payload', `GET /api/rooms/${ROOM}/bootstrap`, async () => {
    const payload = BootstrapPayloadSchema.parse(await fetchJSON(`/api/rooms/${ROOM}/bootstrap`));
    if (!payload.state.marker_groups.some((g) => g.id === 'healthcheck')) {
      throw new Error('Bootstrap state is missing the healthcheck group');
    }
  });

  await runTest('Room diagnostics', `GET /api/rooms/${ROOM}/diagnostics`, async () => {
    const data = await fetchJSON(`/api/rooms/${ROOM}/diagnostics?limit=10`);
    z.object({ ok: z.literal(true), room: z.string(), events: z.array(LogEventSchema) }).parse(data);
  });

  // ─── Report ──────────────────────────────────────────

  console.log('─'.repeat(60));
  let failed = 0;
  for (const r of results) {
    const icon = r.passed ? '✅' : '❌';
    console.log(`  ${icon}  ${r.name.padEnd(30)} ${r.endpoint}`);
    if (!r.passed && r.detail) {
      // Truncate long Zod errors
      const lines = r.detail.split('\n').slice(0, 5).join('\n    ');
      console.log(`       ${lines}`);
      failed++;
    }
  }
  console.log('─'.repeat(60));
  console.log(`\n  Total: ${results.length}  Passed: ${results.length - failed}  Failed: ${failed}\n`);

  if (failed > 0) {
    console.log('❌ Integration health check FAILED\n');
    process.exit(1);
  } else {
    console.log('✅ All integration checks PASSED\n');
    process.exit(0);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(2);
});
