import { describe, it, expect } from 'vitest';
import request from 'supertest';
import {
  buildQueries,
  classifyQuestion,
  SECTION_SEARCH_QUERY,
  scoreRow,
  DEFAULT_CONFIG,
  PaperGraphLoader,
  QuestionAnswerer,
  type PaperGraphRuntime,
} from '@papergraph/core';
import { FakeGraphExecutor, type FakeResponse } from '@papergraph/core/testing';
import { ApiServer } from './server.js';
import { parseApiKeys } from './middleware/auth.js';
import { createOpenAPISpec } from './openapi.js';

// --- Helpers ---

const SYMPTOM_QUESTION = 'Which symptoms point to lung cancer?';
const RESULTS_QUESTION = 'What accuracy did each model reach?';

function queryFor(question: string, index = 0): string {
  const { intent, entities } = classifyQuestion(question);
  const spec = buildQueries(intent, entities, question)[index];
  if (!spec) throw new Error(`no query ${index} for ${question}`);
  return spec.query;
}

function makeRuntime(executor: FakeGraphExecutor, topN = 8): PaperGraphRuntime {
  return {
    config: { ...DEFAULT_CONFIG, ranking: { topN } },
    executor,
    answerer: new QuestionAnswerer(executor, { topN }),
    createLoader: () => new PaperGraphLoader(executor),
    close: () => executor.close(),
  };
}

function createTestServer(options: {
  apiKeys?: string;
  responses?: Array<[string, FakeResponse]>;
  topN?: number;
  withRuntime?: boolean;
} = {}): { server: ApiServer; executor: FakeGraphExecutor } {
  const executor = new FakeGraphExecutor(new Map(options.responses ?? []));
  const server = new ApiServer({
    rootDir: '/tmp/test',
    port: 0,
    apiKeys: parseApiKeys(options.apiKeys),
    ...(options.withRuntime === false ? {} : { runtime: makeRuntime(executor, options.topN) }),
  });
  return { server, executor };
}

// --- Health Check Tests ---

describe('GET /health', () => {
  it('should return 200 with ok status', async () => {
    const { server } = createTestServer();
    const res = await request(server.getApp()).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(typeof res.body.timestamp).toBe('string');
  });

  it('should not require authentication', async () => {
    const { server } = createTestServer({ apiKeys: 'test-key' });
    const res = await request(server.getApp()).get('/health');

    expect(res.status).toBe(200);
  });
});

describe('GET /api/openapi.json', () => {
  it('should return the OpenAPI spec without authentication', async () => {
    const { server } = createTestServer({ apiKeys: 'test-key' });
    const res = await request(server.getApp()).get('/api/openapi.json');

    expect(res.status).toBe(200);
    expect(res.body.info.title).toBe('PaperGraph API');
  });
});

describe('CORS', () => {
  it('should return CORS headers', async () => {
    const { server } = createTestServer();
    const res = await request(server.getApp()).get('/health');

    expect(res.headers['access-control-allow-origin']).toBe('*');
  });

  it('should handle OPTIONS preflight', async () => {
    const { server } = createTestServer();
    const res = await request(server.getApp()).options('/api/v1/ask');

    expect(res.status).toBe(204);
    expect(res.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
  });
});

// --- Authentication Tests ---

describe('Authentication', () => {
  it('should allow requests when no API keys are configured', async () => {
    const { server } = createTestServer();
    const res = await request(server.getApp()).get('/api/v1/status');

    expect(res.status).toBe(200);
  });

  it('should reject requests with a missing API key', async () => {
    const { server } = createTestServer({ apiKeys: 'test-key' });
    const res = await request(server.getApp()).get('/api/v1/status');

    expect(res.status).toBe(401);
    expect(res.body.message).toBe(
      'Missing API key. Provide via Authorization: Bearer <key> or X-API-Key: <key> header.',
    );
  });

  it('should reject requests with an invalid API key', async () => {
    const { server } = createTestServer({ apiKeys: 'test-key' });
    const res = await request(server.getApp()).get('/api/v1/status').set('Authorization', 'Bearer wrong-key');

    expect(res.status).toBe(401);
    expect(res.body.message).toBe('Invalid API key.');
  });

  it('should accept a valid key via Authorization: Bearer', async () => {
    const { server } = createTestServer({ apiKeys: 'test-key' });
    const res = await request(server.getApp()).get('/api/v1/status').set('Authorization', 'Bearer test-key');

    expect(res.status).toBe(200);
  });

  it('should accept a valid key via X-API-Key', async () => {
    const { server } = createTestServer({ apiKeys: 'test-key,other-key' });
    const res = await request(server.getApp()).get('/api/v1/status').set('X-API-Key', 'other-key');

    expect(res.status).toBe(200);
  });
});

describe('parseApiKeys', () => {
  it('should return an empty list for undefined or blank values', () => {
    expect(parseApiKeys(undefined)).toEqual([]);
    expect(parseApiKeys('  ')).toEqual([]);
  });

  it('should split, trim and drop empty entries', () => {
    expect(parseApiKeys(' key-one, ,key-two ,')).toEqual(['key-one', 'key-two']);
  });
});

// --- Ask Endpoint Tests ---

describe('POST /api/v1/ask', () => {
  it('should return ranked rows for a question', async () => {
    const rows = [{ item: 'cough' }, { item: 'lung cancer symptoms' }];
    const { server } = createTestServer({ responses: [[queryFor(SYMPTOM_QUESTION), { rows }]] });

    const res = await request(server.getApp()).post('/api/v1/ask').send({ question: SYMPTOM_QUESTION });

    const { entities } = classifyQuestion(SYMPTOM_QUESTION);
    expect(res.status).toBe(200);
    expect(res.body.intent).toBe('symptoms');
    expect(res.body.entities).toEqual({ diseases: ['lung cancer'], algorithms: [], sections: [] });
    expect(res.body.total).toBe(2);
    expect(res.body.results).toEqual([
      {
        tag: 'Symptoms',
        score: scoreRow(SYMPTOM_QUESTION, 'Symptoms', rows[1]!, entities),
        fields: { item: 'lung cancer symptoms' },
      },
      {
        tag: 'Symptoms',
        score: scoreRow(SYMPTOM_QUESTION, 'Symptoms', rows[0]!, entities),
        fields: { item: 'cough' },
      },
    ]);
  });

  it('should merge the results and best model queries', async () => {
    const { server } = createTestServer({
      responses: [
        [queryFor(RESULTS_QUESTION, 0), { rows: [{ model: 'Random Forest', metric: 'Accuracy (%)', accuracy: 99.99 }] }],
        [queryFor(RESULTS_QUESTION, 1), { rows: [{ bestModel: 'Random Forest' }] }],
      ],
    });

    const res = await request(server.getApp()).post('/api/v1/ask').send({ question: RESULTS_QUESTION });

    expect(res.status).toBe(200);
    expect(res.body.intent).toBe('results');
    expect(res.body.results.map((r: { tag: string }) => r.tag)).toEqual(['Results', 'BestModel']);
  });

  it('should apply top_n', async () => {
    const rows = [{ item: 'cough' }, { item: 'fatigue' }, { item: 'wheezing' }];
    const { server } = createTestServer({ responses: [[queryFor(SYMPTOM_QUESTION), { rows }]] });

    const res = await request(server.getApp()).post('/api/v1/ask').send({ question: SYMPTOM_QUESTION, top_n: 2 });

    expect(res.body.results).toHaveLength(2);
    expect(res.body.total).toBe(3);
  });

  it('should default to the configured topN', async () => {
    const rows = [{ item: 'cough' }, { item: 'fatigue' }, { item: 'wheezing' }];
    const { server } = createTestServer({ topN: 1, responses: [[queryFor(SYMPTOM_QUESTION), { rows }]] });

    const res = await request(server.getApp()).post('/api/v1/ask').send({ question: SYMPTOM_QUESTION });

    expect(res.body.results).toHaveLength(1);
  });

  it('should send the raw question to the section search for generic questions', async () => {
    const { server, executor } = createTestServer();

    const res = await request(server.getApp()).post('/api/v1/ask').send({ question: 'Tell me about Smoking' });

    expect(res.status).toBe(200);
    expect(res.body.intent).toBe('generic');
    expect(executor.reads.map((r) => r.params)).toEqual([{ q: 'Tell me about Smoking' }]);
  });

  it('should not trim the question before binding it to the section search', async () => {
    const { server, executor } = createTestServer();

    const res = await request(server.getApp()).post('/api/v1/ask').send({ question: '  Tell me about Smoking  ' });

    expect(res.status).toBe(200);
    expect(res.body.question).toBe('  Tell me about Smoking  ');
    expect(executor.reads.map((r) => r.params)).toEqual([{ q: '  Tell me about Smoking  ' }]);
  });

  it('should return 400 for a missing question', async () => {
    const { server } = createTestServer();
    const res = await request(server.getApp()).post('/api/v1/ask').send({});

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Validation Error');
  });

  it('should return 400 for a blank question', async () => {
    const { server } = createTestServer();
    const res = await request(server.getApp()).post('/api/v1/ask').send({ question: '   ' });

    expect(res.status).toBe(400);
  });

  it('should return 400 for top_n above 100', async () => {
    const { server } = createTestServer();
    const res = await request(server.getApp()).post('/api/v1/ask').send({ question: SYMPTOM_QUESTION, top_n: 101 });

    expect(res.status).toBe(400);
  });

  it('should return 500 when a graph query fails', async () => {
    const { server } = createTestServer({
      responses: [[queryFor(SYMPTOM_QUESTION), { error: 'Query failed: timeout' }]],
    });

    const res = await request(server.getApp()).post('/api/v1/ask').send({ question: SYMPTOM_QUESTION });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'Query Failed', message: 'Symptoms query failed: Query failed: timeout' });
  });

  it('should return 503 when the graph is not initialized', async () => {
    const { server } = createTestServer({ withRuntime: false });
    const res = await request(server.getApp()).post('/api/v1/ask').send({ question: SYMPTOM_QUESTION });

    expect(res.status).toBe(503);
    expect(res.body.error).toBe('Service Unavailable');
  });
});

// --- Classify Endpoint Tests ---

describe('POST /api/v1/classify', () => {
  it('should return intent, entities and queries without touching the graph', async () => {
    const { server, executor } = createTestServer({ withRuntime: false });

    const res = await request(server.getApp())
      .post('/api/v1/classify')
      .send({ question: 'What is the accuracy of SVM in the results section?' });

    expect(res.status).toBe(200);
    expect(res.body.intent).toBe('results');
    expect(res.body.entities).toEqual({ diseases: [], algorithms: ['svm'], sections: ['results'] });
    expect(res.body.queries.map((q: { tag: string }) => q.tag)).toEqual(['Results', 'BestModel']);
    expect(executor.reads).toHaveLength(0);
  });

  it('should keep surrounding whitespace in the fallback query parameter', async () => {
    const { server } = createTestServer({ withRuntime: false });

    const res = await request(server.getApp()).post('/api/v1/classify').send({ question: '  Who are the authors  ' });

    expect(res.status).toBe(200);
    expect(res.body.question).toBe('  Who are the authors  ');
    expect(res.body.queries).toEqual([
      { tag: 'Sections', query: SECTION_SEARCH_QUERY, params: { q: '  Who are the authors  ' } },
    ]);
  });

  it('should return 400 for a whitespace-only question', async () => {
    const { server } = createTestServer();
    const res = await request(server.getApp()).post('/api/v1/classify').send({ question: '   ' });

    expect(res.status).toBe(400);
    expect(res.body.details[0].message).toBe('question must not be empty');
  });

  it('should return 400 for an empty question', async () => {
    const { server } = createTestServer();
    const res = await request(server.getApp()).post('/api/v1/classify').send({ question: '' });

    expect(res.status).toBe(400);
  });
});

// --- Status Endpoint Tests ---

describe('GET /api/v1/status', () => {
  it('should report graph statistics', async () => {
    const { server } = createTestServer({
      responses: [
        ['MATCH (n) RETURN count(n) AS count', { rows: [{ count: 5 }] }],
        ['MATCH ()-[r]->() RETURN count(r) AS count', { rows: [{ count: 4 }] }],
        [
          'MATCH (n) RETURN labels(n)[0] AS type, count(*) AS count ORDER BY count DESC',
          { rows: [{ type: 'Symptom', count: 5 }] },
        ],
      ],
    });

    const res = await request(server.getApp()).get('/api/v1/status');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      health: 'ok',
      graph_uri: 'neo4j://127.0.0.1:7687',
      top_n: 8,
      total_nodes: 5,
      total_relationships: 4,
      node_types: [{ label: 'Symptom', count: 5 }],
    });
  });

  it('should report degraded for an empty graph', async () => {
    const { server } = createTestServer();
    const res = await request(server.getApp()).get('/api/v1/status');

    expect(res.body.health).toBe('degraded');
    expect(res.body.total_nodes).toBe(0);
  });

  it('should report degraded with a message when a count fails', async () => {
    const { server } = createTestServer({
      responses: [['MATCH (n) RETURN count(n) AS count', { error: 'Query failed: unavailable' }]],
    });

    const res = await request(server.getApp()).get('/api/v1/status');

    expect(res.body.health).toBe('degraded');
    expect(res.body.message).toBe('Query failed: unavailable');
  });

  it('should report not_initialized without a runtime', async () => {
    const { server } = createTestServer({ withRuntime: false });
    const res = await request(server.getApp()).get('/api/v1/status');

    expect(res.body).toEqual({
      health: 'not_initialized',
      graph_uri: null,
      top_n: null,
      total_nodes: 0,
      total_relationships: 0,
      node_types: [],
    });
  });
});

// --- OpenAPI Spec Tests ---

describe('OpenAPI Spec', () => {
  it('should define every API path', () => {
    expect(Object.keys(createOpenAPISpec().paths).sort()).toEqual([
      '/api/v1/ask',
      '/api/v1/classify',
      '/api/v1/status',
      '/health',
    ]);
  });

  it('should define security schemes', () => {
    expect(createOpenAPISpec().components['securitySchemes']).toEqual({
      bearerAuth: expect.objectContaining({ type: 'http', scheme: 'bearer' }),
      apiKeyAuth: expect.objectContaining({ type: 'apiKey', name: 'X-API-Key' }),
    });
  });
});

// --- ApiServer Lifecycle Tests ---

describe('ApiServer', () => {
  it('should keep the injected runtime on initialize', async () => {
    const { server, executor } = createTestServer();
    await server.initialize();

    const res = await request(server.getApp()).post('/api/v1/ask').send({ question: SYMPTOM_QUESTION });
    expect(res.status).toBe(200);
    expect(executor.reads).toHaveLength(1);
  });

  it('should close the runtime on close', async () => {
    const { server, executor } = createTestServer();
    await server.close();

    expect(executor.closed).toBe(true);
  });

  it('should start and stop cleanly on an ephemeral port', async () => {
    const { server } = createTestServer();
    await server.start();
    await server.close();
  });
});
