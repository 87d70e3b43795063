import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildTestApp, ingest } from './testApp.js';
import { INSUFFICIENT_INFORMATION_MESSAGE } from '../../knowledge/prompts.js';
import { buildPipelineConfig } from '../../config.js';
import { ScriptedLanguage, hang } from '../../knowledge/__tests__/fakes.js';

let app: FastifyInstance;

afterEach(async () => {
  await app.close();
});

function query(payload: Record<string, unknown>, headers: Record<string, string> = {}) {
  return app.inject({ method: 'POST', url: '/query', payload, headers });
}

/* ============= Answers ============= */

describe('POST /query', () => {
  it('answers a factual question from an ingested document', async () => {
    app = await buildTestApp();
    const ingested = await ingest(app);
    const documentId: unknown = ingested.json().document_id;

    const res = await query({ question: 'Where does John Smith work?' });
    expect(res.statusCode).toBe(200);

    const body = res.json();
    expect(body.answer).toBe('John Smith works at Tech Corp.');
    expect(body.query_type).toBe('factual');
    expect(body.rejected).toBe(false);
    expect(body.confidence).toBe(body.confidence_report.score);
    expect(body.confidence_report.verdict).toBe('accept');
    expect(body.confidence_report.components.rejection_penalty).toBe(1);
    expect(body.sources).toHaveLength(1);
    expect(body.sources[0].document_id).toBe(documentId);
    expect(body.sources[0].chunk_id).toBe(`${String(documentId)}_chunk_0`);
    expect(body.reasoning_steps).toHaveLength(5);
  });

  it('includes graph context for a relational question', async () => {
    app = await buildTestApp();
    await ingest(app);

    const res = await query({ question: 'Who works at Tech Corp?' });
    const body = res.json();

    expect(body.query_type).toBe('relational');
    expect(body.kg_context.relations).toEqual([
      { source: 'John Smith', target: 'Tech Corp', type: 'WORKS_AT' },
      { source: 'Tech Corp', target: 'Boston City', type: 'LOCATED_IN' },
    ]);
    expect(body.kg_context.traversal_path).toEqual([
      'John Smith --[WORKS_AT]--> Tech Corp',
      'Tech Corp --[LOCATED_IN]--> Boston City',
    ]);
    expect(body.answer).toBe('John Smith --[WORKS_AT]--> Tech Corp');
  });

  it('leaves out graph context when use_hybrid is false', async () => {
    app = await buildTestApp();
    await ingest(app);

    const res = await query({ question: 'Who works at Tech Corp?', use_hybrid: false });
    expect(res.json().kg_context).toEqual({ entities: [], relations: [], traversal_path: [] });
  });

  it('refuses when the corpus holds nothing relevant', async () => {
    app = await buildTestApp();

    const res = await query({ question: 'What is the revenue of Nonexistent Corp?' });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.answer).toBe(INSUFFICIENT_INFORMATION_MESSAGE);
    expect(body.rejected).toBe(true);
    expect(body.sources).toEqual([]);
    expect(body.confidence_report.reason).toBe('no context was retrieved');
  });

  it('echoes the caller request id', async () => {
    app = await buildTestApp();
    const res = await query({ question: 'Where does John Smith work?' }, { 'x-request-id': 'req-123' });
    expect(res.headers['x-request-id']).toBe('req-123');
  });
});

/* ============= Validation ============= */

describe('POST /query validation', () => {
  it.each([
    [{}, 'question is required and must be a non-empty string'],
    [{ question: '   ' }, 'question is required and must be a non-empty string'],
    [{ question: 42 }, 'question is required and must be a non-empty string'],
    [{ question: 'Who?', use_hybrid: 'yes' }, 'use_hybrid must be a boolean'],
    [{ question: 'Who?', top_k: 0 }, 'top_k must be a positive integer'],
    [{ question: 'Who?', top_k: 1.5 }, 'top_k must be a positive integer'],
  ])('rejects %j', async (payload, message) => {
    app = await buildTestApp();
    const res = await query(payload);
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'invalid_input', message });
  });
});

/* ============= Failures ============= */

describe('POST /query failures', () => {
  it('returns 503 when generation stays unavailable', async () => {
    app = await buildTestApp({
      language: new ScriptedLanguage(['factual'], [new Error('upstream 500')]),
    });
    await ingest(app);

    const res = await query({ question: 'Where does John Smith work?' });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ error: 'capability_unavailable', stage: 'generating' });
  });

  it('returns 504 when the run misses its deadline', async () => {
    app = await buildTestApp({
      language: new ScriptedLanguage(['factual'], [hang]),
      pipelineConfig: buildPipelineConfig({ retryBackoffMs: 0, requestTimeoutMs: 30 }),
    });
    await ingest(app);

    const res = await query({ question: 'Where does John Smith work?' });
    expect(res.statusCode).toBe(504);
    expect(res.json()).toEqual({
      error: 'pipeline_timeout',
      stage: 'generating',
      message: 'Pipeline aborted during generating: deadline of 30ms elapsed',
    });
  });
});
