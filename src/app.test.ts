import request from 'supertest';
import { buildTestApp, silenceConsole } from './testing/testApp';
import { removeDir } from './testing/fixtures';

describe('app', () => {
  let ctx: Awaited<ReturnType<typeof buildTestApp>>;

  beforeEach(async () => {
    silenceConsole();
    ctx = await buildTestApp();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(ctx.dir);
  });

  it('reports liveness', async () => {
    const res = await request(ctx.app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.service).toBe('health-score-service');
    expect(Number.isNaN(Date.parse(res.body.timestamp))).toBe(false);
  });

  it('answers unknown routes with JSON 404', async () => {
    const res = await request(ctx.app).get('/api/nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, error: 'Not found: /api/nope' });
  });

  it('sets security headers', async () => {
    const res = await request(ctx.app).get('/health');
    expect(res.headers['x-content-type-options']).toBe('nosniff');
  });

  it('allows the configured origin', async () => {
    const res = await request(ctx.app).get('/health').set('Origin', 'http://localhost:3000');
    expect(res.headers['access-control-allow-origin']).toBe('http://localhost:3000');
  });
});
