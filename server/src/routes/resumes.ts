import { randomUUID } from 'node:crypto';
import { Hono } from 'hono';
import { z } from 'zod';
import { rejectOversizedBody } from '../lib/http-body-guard.js';
import { sanitizeFilename, validateUpload } from '../lib/security.js';
import { validateInput } from '../lib/validate.js';
import { errorMessage } from '../pipeline/errors.js';
import { PROCESS_RESUME_JOB, type JobQueue } from '../queue/job-queue.js';
import { SENIORITY_LEVELS, type ApplicationRecord, type ApplicationRepository } from '../repositories/applications.js';
import type { DocumentStore } from '../services/document-store.js';

export interface ResumeRouteDeps {
  applications: ApplicationRepository;
  store: DocumentStore;
  queue: JobQueue;
  maxUploadBytes: number;
}

const UploadFormSchema = z.object({
  candidate_name: z.string().trim().min(1).max(200),
  candidate_email: z.string().trim().email().max(320),
  job_post_id: z.string().uuid(),
  seniority_level: z.enum(SENIORITY_LEVELS).optional(),
});

// Multipart boundaries and the text fields ride on top of the file itself.
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
function isValidUuid(value: string): boolean {
  return UUID_RE.test(value.trim());
}

export function createResumeRoutes(deps: ResumeRouteDeps): Hono {
  const resumes = new Hono();

  // POST /upload: store the document and queue it for processing
  resumes.post('/upload', async (c) => {
    const log = c.get('log');
    const tooLarge = rejectOversizedBody(c, deps.maxUploadBytes + MULTIPART_OVERHEAD_BYTES);
    if (tooLarge) return tooLarge;

    const body = await c.req.parseBody().catch((err: unknown) => {
      log.warn({ error: errorMessage(err) }, 'Unreadable upload body');
      return null;
    });
    if (!body) {
      return c.json({ error: 'Expected a multipart/form-data body' }, 400);
    }

    const file = body['file'];
    if (!(file instanceof File)) {
      return c.json({ error: 'A resume file is required' }, 400);
    }
    const fileCheck = validateUpload(file, deps.maxUploadBytes);
    if (!fileCheck.ok) {
      return c.json({ error: fileCheck.error }, 400);
    }

    const form = validateInput(UploadFormSchema, {
      candidate_name: body['candidate_name'],
      candidate_email: body['candidate_email'],
      job_post_id: body['job_post_id'],
      seniority_level: body['seniority_level'] || undefined,
    });
    if (!form.success) {
      return c.json({ error: 'Invalid upload form', details: form.issues }, 400);
    }
    const { candidate_name, candidate_email, job_post_id, seniority_level } = form.data;

    let applicationId: string;
    try {
      const application = await deps.applications.create({
        candidate_name,
        candidate_email,
        job_post_id,
        original_filename: file.name,
        seniority_level: seniority_level ?? null,
      });
      applicationId = application.id;
    } catch (err) {
      log.error({ error: errorMessage(err) }, 'Failed to create application');
      return c.json({ error: 'Failed to process resume upload' }, 500);
    }

    const locator = `resumes/${randomUUID()}_${sanitizeFilename(file.name)}`;
    try {
      const bytes = new Uint8Array(await file.arrayBuffer());
      await deps.store.put(bytes, locator, file.type);
      await deps.applications.markQueued(applicationId, locator);
      await deps.queue.enqueue(PROCESS_RESUME_JOB, { application_id: applicationId, job_post_id });
    } catch (err) {
      const message = errorMessage(err);
      log.error({ applicationId, error: message }, 'Failed to queue resume for processing');
      try {
        await deps.applications.recordFailure(
          applicationId,
          JSON.stringify({ stage: 'upload', error: `Failed to queue resume: ${message}` }),
        );
      } catch (persistErr) {
        log.error({ applicationId, error: errorMessage(persistErr) }, 'Failed to mark application as FAILED');
      }
      return c.json({ error: 'Failed to process resume upload' }, 500);
    }

    log.info({ applicationId, jobPostId: job_post_id }, 'Resume accepted');
    return c.json({
      application_id: applicationId,
      job_post_id,
      seniority_level: seniority_level ?? null,
      status: 'QUEUED',
      message: 'Resume accepted and is being processed in the background.',
    }, 202);
  });

  // GET /:id: processing status and results
  resumes.get('/:id', async (c) => {
    const applicationId = c.req.param('id');
    if (!isValidUuid(applicationId)) return c.json({ error: 'Invalid application id' }, 400);

    let application: ApplicationRecord | null;
    try {
      application = await deps.applications.get(applicationId);
    } catch (err) {
      c.get('log').error({ applicationId, error: errorMessage(err) }, 'Failed to load application');
      return c.json({ error: 'Failed to load application' }, 500);
    }
    if (!application) return c.json({ error: 'Application not found' }, 404);

    const { embedded_value: _embedding, ...status } = application;
    return c.json(status);
  });

  return resumes;
}
