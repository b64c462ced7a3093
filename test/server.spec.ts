import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Express } from 'express';
import type { Server } from 'http';
import { createApp } from '../src/server/app.js';
import { InMemoryTemplateStore, type TemplateSummary } from '../src/persistence/template-store.js';
import { QueryConfigSchema, queryFromConfig } from '../src/persistence/config.js';
import { sampleConfig } from '../src/persistence/sample.js';
import type { Settings } from '../src/utils/settings.js';

const settings: Settings = {
  env: 'development',
  logLevel: 'info',
  port: 0,
  templatesDir: 'unused',
  rateLimit: { windowMs: 60000, max: 1000 },
};

class FailingTemplateStore extends InMemoryTemplateStore {
  listAll(): TemplateSummary[] {
    throw new Error('template directory is gone');
  }
}

interface TestServer {
  request(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }>;
  close(): Promise<void>;
}

// Binds to an ephemeral loopback port inside the test process
async function serve(app: Express): Promise<TestServer> {
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
  const baseUrl = `http://127.0.0.1:${address.port}`;

  return {
    async request(method, path, body) {
      const res = await fetch(baseUrl + path, {
        method,
        headers: { 'content-type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
      const json: unknown = await res.json();
      return { status: res.status, body: json };
    },
    close: () => new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve()))),
  };
}

describe('HTTP API', () => {
  let api: TestServer;

  beforeAll(async () => {
    api = await serve(createApp({ store: new InMemoryTemplateStore(), settings }));
  });

  afterAll(async () => {
    await api.close();
  });

  it('reports health', async () => {
    const res = await api.request('GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'healthy' });
  });

  it('renders a configuration into a report', async () => {
    const res = await api.request('POST', '/api/render', { config: sampleConfig });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      sql: queryFromConfig(sampleConfig).toSQL(),
      problems: [],
      stats: { lines: 10, tables: 2, joins: 1, filters: 1, caseWhens: 0, orderBys: 1 },
    });
  });

  it('answers 400 for a malformed configuration', async () => {
    const res = await api.request('POST', '/api/render', { config: { tables: 'products' } });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: 'Validation error' });
  });

  it('validates SQL text', async () => {
    const res = await api.request('POST', '/api/validate', { sql: 'SELECT (a FROM t;' });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ valid: false, errors: ['Unbalanced parentheses'] });
  });

  it('answers 400 for a validate request without SQL', async () => {
    const res = await api.request('POST', '/api/validate', {});
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: 'Validation error' });
  });

  it('serves the example configuration', async () => {
    const res = await api.request('GET', '/api/example');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ config: QueryConfigSchema.parse(sampleConfig) });
  });

  it('saves, lists, reads and deletes templates', async () => {
    expect((await api.request('PUT', '/api/templates/products', { config: sampleConfig })).body).toEqual({
      name: 'products',
    });

    expect((await api.request('GET', '/api/templates')).body).toEqual({ templates: [{ name: 'products' }] });

    const read = await api.request('GET', '/api/templates/products');
    expect(read.status).toBe(200);
    expect(read.body).toEqual({ name: 'products', config: QueryConfigSchema.parse(sampleConfig) });

    const deleted = await api.request('DELETE', '/api/templates/products');
    expect(deleted.status).toBe(200);
    expect(deleted.body).toEqual({ deleted: 'products' });
  });

  it('answers 404 for unknown templates', async () => {
    const read = await api.request('GET', '/api/templates/missing');
    expect(read.status).toBe(404);
    expect(read.body).toEqual({ error: 'Template not found' });

    const deleted = await api.request('DELETE', '/api/templates/missing');
    expect(deleted.status).toBe(404);
    expect(deleted.body).toEqual({ error: 'Template not found' });
  });

  it('answers 400 when saving a template without a configuration', async () => {
    const res = await api.request('PUT', '/api/templates/empty', {});
    expect(res.status).toBe(400);
  });
});

describe('HTTP API errors', () => {
  it('shows the failure message in development', async () => {
    const api = await serve(createApp({ store: new FailingTemplateStore(), settings }));
    try {
      const res = await api.request('GET', '/api/templates');
      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'Internal server error', message: 'template directory is gone' });
    } finally {
      await api.close();
    }
  });

  it('hides the failure message in production', async () => {
    const api = await serve(createApp({ store: new FailingTemplateStore(), settings: { ...settings, env: 'production' } }));
    try {
      const res = await api.request('GET', '/api/templates');
      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'Internal server error', message: 'Something went wrong' });
    } finally {
      await api.close();
    }
  });
});
