/**
 * Tests for the resume upload and status routes.
 *
 * The app is built over the in-memory repository, document store and job
 * queue, and driven through app.request().
 */
import { describe, it, expect, vi } from 'vitest';
import { createApp } from '../app.js';
import {
  APPLICATION_ID,
  InMemoryApplicationRepository,
  JOB_POST_ID,
  MemoryDocumentStore,
  MemoryJobQueue,
  makeApplication,
} from './fixtures/in-memory.js';

const NEW_ID = '00000000-0000-4000-8000-000000000001';

function buildApp(initial = [makeApplication({ status: 'COMPLETED', embedded_value: [0.1, 0.2] })]) {
  const applications = new InMemoryApplicationRepository(initial);
  const store = new MemoryDocumentStore();
  const queue = new MemoryJobQueue();
  const app = createApp({ applications, store, queue, maxUploadBytes: 1024 * 1024 });
  return { app, applications, store, queue };
}

function uploadForm(overrides: Record<string, string | File | null> = {}): FormData {
  const fields: Record<string, string | File | null> = {
    file: new File(['%PDF-1.4 test resume'], 'My Resume (final).pdf', { type: 'application/pdf' }),
    candidate_name: 'Jane Doe',
    candidate_email: 'jane@example.com',
    job_post_id: JOB_POST_ID,
    ...overrides,
  };
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    if (value !== null) form.append(key, value);
  }
  return form;
}

describe('POST /api/resumes/upload', () => {
  it('stores the document, queues it and answers 202', async () => {
    const { app, applications, store, queue } = buildApp([]);

    const res = await app.request('/api/resumes/upload', { method: 'POST', body: uploadForm() });

    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({
      application_id: NEW_ID,
      job_post_id: JOB_POST_ID,
      seniority_level: null,
      status: 'QUEUED',
      message: 'Resume accepted and is being processed in the background.',
    });

    const [locator] = [...store.objects.keys()];
    expect(locator).toMatch(/^resumes\/[0-9a-f-]{36}_My_Resume__final_\.pdf$/);
    expect(store.objects.get(locator)?.contentType).toBe('application/pdf');

    const row = await applications.get(NEW_ID);
    expect(row?.status).toBe('QUEUED');
    expect(row?.s3_path).toBe(locator);
    expect(row?.original_filename).toBe('My Resume (final).pdf');
    expect(queue.jobs).toHaveLength(1);
    expect(queue.jobs[0]).toMatchObject({
      name: 'process_resume',
      data: { application_id: NEW_ID, job_post_id: JOB_POST_ID },
    });
  });

  it('keeps the seniority level', async () => {
    const { app, applications } = buildApp([]);

    const res = await app.request('/api/resumes/upload', {
      method: 'POST',
      body: uploadForm({ seniority_level: 'senior' }),
    });

    expect(res.status).toBe(202);
    const body = await res.json() as { seniority_level: string | null };
    expect(body.seniority_level).toBe('senior');
    expect((await applications.get(NEW_ID))?.seniority_level).toBe('senior');
  });

  it('requires a file', async () => {
    const { app, queue } = buildApp([]);

    const res = await app.request('/api/resumes/upload', { method: 'POST', body: uploadForm({ file: null }) });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'A resume file is required' });
    expect(queue.jobs).toHaveLength(0);
  });

  it('rejects a disallowed file type', async () => {
    const { app } = buildApp([]);
    const file = new File(['png bytes'], 'photo.png', { type: 'image/png' });

    const res = await app.request('/api/resumes/upload', { method: 'POST', body: uploadForm({ file }) });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'File type not allowed. Upload a PDF, Word document or plain text file.',
    });
  });

  it('rejects an empty file', async () => {
    const { app } = buildApp([]);
    const file = new File([], 'resume.pdf', { type: 'application/pdf' });

    const res = await app.request('/api/resumes/upload', { method: 'POST', body: uploadForm({ file }) });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'File is empty' });
  });

  it('rejects invalid form fields', async () => {
    const { app, applications } = buildApp([]);

    const res = await app.request('/api/resumes/upload', {
      method: 'POST',
      body: uploadForm({ candidate_email: 'not-an-email' }),
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid upload form', details: ['candidate_email: Invalid email'] });
    expect(applications.rows.size).toBe(0);
  });

  it('marks the application failed when storage is unavailable', async () => {
    const { app, applications, store, queue } = buildApp([]);
    store.failWith = new Error('bucket unavailable');

    const res = await app.request('/api/resumes/upload', { method: 'POST', body: uploadForm() });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Failed to process resume upload' });
    const row = await applications.get(NEW_ID);
    expect(row?.status).toBe('FAILED');
    expect(row?.failed_reason).toBe(
      JSON.stringify({ stage: 'upload', error: 'Failed to queue resume: bucket unavailable' }),
    );
    expect(queue.jobs).toHaveLength(0);
  });

  it('marks the application failed when the queue is unavailable', async () => {
    const { app, applications, queue } = buildApp([]);
    queue.failWith = new Error('redis down');

    const res = await app.request('/api/resumes/upload', { method: 'POST', body: uploadForm() });

    expect(res.status).toBe(500);
    expect((await applications.get(NEW_ID))?.failed_reason).toBe(
      JSON.stringify({ stage: 'upload', error: 'Failed to queue resume: redis down' }),
    );
  });
});

describe('GET /api/resumes/:id', () => {
  it('returns the application without its embedding', async () => {
    const { app } = buildApp();

    const res = await app.request(`/api/resumes/${APPLICATION_ID}`);

    expect(res.status).toBe(200);
    const body = await res.json() as Record<string, unknown>;
    expect(body.id).toBe(APPLICATION_ID);
    expect(body.status).toBe('COMPLETED');
    expect('embedded_value' in body).toBe(false);
  });

  it('rejects a malformed id', async () => {
    const { app } = buildApp();

    const res = await app.request('/api/resumes/not-a-uuid');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid application id' });
  });

  it('answers 404 for an unknown application', async () => {
    const { app } = buildApp();

    const res = await app.request('/api/resumes/33333333-3333-4333-8333-333333333333');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Application not found' });
  });
});

describe('app', () => {
  it('reports health and caches the probe', async () => {
    const { app, applications } = buildApp();
    const ping = vi.spyOn(applications, 'ping');

    const first = await app.request('/health');
    const second = await app.request('/health');

    expect(first.status).toBe(200);
    expect(await first.json()).toMatchObject({ status: 'ok', db_ok: true, cached: false });
    expect(await second.json()).toMatchObject({ status: 'ok', cached: true });
    expect(ping).toHaveBeenCalledTimes(1);
  });

  it('reports degraded health when the database probe fails', async () => {
    const { app, applications } = buildApp();
    vi.spyOn(applications, 'ping').mockRejectedValue(new Error('connection refused'));

    const res = await app.request('/health');

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: 'degraded', db_ok: false });
  });

  it('refuses new work while draining but still answers health checks', async () => {
    const applications = new InMemoryApplicationRepository();
    const app = createApp({
      applications,
      store: new MemoryDocumentStore(),
      queue: new MemoryJobQueue(),
      maxUploadBytes: 1024,
      isShuttingDown: () => true,
    });

    const upload = await app.request(`/api/resumes/${APPLICATION_ID}`);
    const health = await app.request('/health');

    expect(upload.status).toBe(503);
    expect(health.status).toBe(503);
    expect(await health.json()).toMatchObject({ status: 'draining' });
  });

  it('answers unknown routes with a JSON 404', async () => {
    const { app } = buildApp();

    const res = await app.request('/nope', { headers: { 'X-Request-ID': 'req-42' } });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
    expect(res.headers.get('X-Request-ID')).toBe('req-42');
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
  });
});
