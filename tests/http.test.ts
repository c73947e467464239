import type { Server } from 'node:http';
import axios, { type AxiosInstance } from 'axios';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createApp } from '@/app';
import { InMemoryTripStore } from '@/memory/InMemoryTripStore';
import { createPlannerDeps } from '@/services/pipeline-deps';
import { loadCatalog, testConfig } from './helpers';

const config = testConfig();
const store = new InMemoryTripStore();
const { tripService } = createPlannerDeps(config, {
  catalog: loadCatalog(),
  liveClients: [],
  generativeBackend: null,
  store,
});

const body = {
  destination: 'Lisbon',
  origin: 'New York',
  startDate: '2031-06-01',
  endDate: '2031-06-05',
  budget: 6000,
  travelers: 2,
};

let server: Server;
let http: AxiosInstance;

beforeAll(async () => {
  server = createApp(config, tripService).listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
  http = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
});

afterAll(async () => {
  await tripService.close();
  store.close();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

describe('HTTP surface', () => {
  it('answers health checks', async () => {
    const res = await http.get('/health');
    expect(res.status).toBe(200);
    expect(res.data.status).toBe('OK');
    expect(res.data.environment).toBe('test');
  });

  it('accepts a trip and serves its status', async () => {
    const created = await http.post('/api/trips', body);
    expect(created.status).toBe(202);
    expect(created.data.success).toBe(true);
    expect(created.data.data.state).toBe('created');

    const tripId: string = created.data.data.tripId;
    await tripService.waitForTrip(tripId);

    const status = await http.get(`/api/trips/${tripId}`);
    expect(status.status).toBe(200);
    expect(status.data.data.state).toBe('done');
    expect(status.data.data.verification.score).toBe(100);

    const cancel = await http.delete(`/api/trips/${tripId}`);
    expect(cancel.status).toBe(409);
    expect(cancel.data).toEqual({ success: false, message: 'Trip is not running (state: done)', code: 'NOT_RUNNING' });
  });

  it('rejects an invalid trip request', async () => {
    const res = await http.post('/api/trips', { ...body, budget: -1 });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      success: false,
      message: 'Invalid trip request',
      errors: [{ path: 'budget', message: 'Budget must be greater than 0' }],
      code: 'VALIDATION_ERROR',
    });
  });

  it('returns 404 for unknown trips, agents and routes', async () => {
    expect((await http.get('/api/trips/missing')).status).toBe(404);
    expect((await http.delete('/api/trips/missing')).status).toBe(404);
    expect((await http.post('/api/agents/weather', body)).data.message).toBe('Unknown agent category "weather"');
    expect((await http.get('/nope')).data.message).toBe('Route GET /nope not found');
  });

  it('runs a single agent on request', async () => {
    const res = await http.post('/api/agents/transport', body);
    expect(res.status).toBe(200);
    expect(res.data.data.category).toBe('transport');
    expect(res.data.data.payload.totalCost).toBe(1960);
  });

  it('answers a malformed JSON body with a validation error', async () => {
    const res = await http.post('/api/trips', '{"destination": ', {
      headers: { 'Content-Type': 'application/json' },
    });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ success: false, message: 'Request body is not valid JSON', code: 'VALIDATION_ERROR' });
  });

  it('modifies a trip and takes the change back', async () => {
    const created = await http.post('/api/trips', body);
    const tripId: string = created.data.data.tripId;
    await tripService.waitForTrip(tripId);

    const modified = await http.post(`/api/trips/${tripId}/modifications`, { budget: 1000 });
    expect(modified.status).toBe(202);
    expect(modified.data).toEqual({
      success: true,
      data: { tripId, state: 'created', changed: ['budget'], rerun: ['lodging', 'transport'], revision: 1 },
    });
    await tripService.waitForTrip(tripId);

    const status = await http.get(`/api/trips/${tripId}`);
    expect(status.data.data.request.budget).toBe(1000);
    expect(status.data.data.verification.passed).toBe(false);
    expect(status.data.data.canUndo).toBe(true);

    const undo = await http.post(`/api/trips/${tripId}/undo`);
    expect(undo.status).toBe(200);
    expect(undo.data).toEqual({ success: true, data: { tripId, state: 'done', revision: 0 } });

    const again = await http.post(`/api/trips/${tripId}/undo`);
    expect(again.status).toBe(409);
    expect(again.data).toEqual({ success: false, message: 'Nothing to undo', code: 'NO_REVISION' });

    const redo = await http.post(`/api/trips/${tripId}/redo`);
    expect(redo.data.data.revision).toBe(1);
  });

  it('rejects modifications that are malformed or cannot apply', async () => {
    const created = await http.post('/api/trips', body);
    const tripId: string = created.data.data.tripId;
    await tripService.waitForTrip(tripId);

    const empty = await http.post(`/api/trips/${tripId}/modifications`, {});
    expect(empty.status).toBe(400);
    expect(empty.data).toEqual({
      success: false,
      message: 'Invalid modification',
      errors: [{ path: 'root', message: 'A modification must name at least one field' }],
      code: 'VALIDATION_ERROR',
    });

    const conflict = await http.post(`/api/trips/${tripId}/modifications`, { endDate: '2031-05-30' });
    expect(conflict.status).toBe(422);
    expect(conflict.data).toEqual({
      success: false,
      message: 'Modification cannot be applied',
      errors: [{ path: 'endDate', message: 'endDate must be after startDate' }],
      code: 'MODIFICATION_CONFLICT',
    });

    expect((await http.post('/api/trips/missing/modifications', { budget: 5000 })).status).toBe(404);
    expect((await http.post('/api/trips/missing/redo')).status).toBe(404);
  });
});
