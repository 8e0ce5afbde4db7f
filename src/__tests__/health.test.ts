import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { checkServer } from '../lib/health.js';
import { createApp } from '../server/app.js';
import { listen, type RunningServer } from './helpers/server.js';

describe('checkServer', () => {
  let server: RunningServer;

  beforeAll(async () => {
    server = await listen(createApp());
  });

  afterAll(async () => {
    await server.close();
  });

  it('finds the health endpoint', async () => {
    await expect(checkServer(`${server.url}/`)).resolves.toEqual({
      reachable: true,
      url: `${server.url}/health`,
      statusCode: 200,
    });
  });

  it('reports an unreachable server', async () => {
    const closed = await listen(createApp());
    const url = closed.url;
    await closed.close();

    await expect(checkServer(url, 2000)).resolves.toEqual({ reachable: false });
  });
});
