import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from './app';
import { loadConfig } from './config/env';
import type { TextExtractor } from './services/textExtractor';
import { MemoryDocumentStore } from './store/memoryStore';
import type { GeneratedContent } from './types/content';
import { Logger } from './utils/Logger';

const config = loadConfig({
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
});

const content: GeneratedContent = {
  title: 'Platform Engineer',
  summary: 'Summary text',
  bullets: ['Delivered kubernetes-focused outcomes: Migrated clusters to kubernetes'],
  cover_letter: 'Dear Hiring Manager,',
  header: 'Impact-forward Resume',
  footer: 'Created with Resume Builder',
  advice: 'Record a short Loom.',
};

describe('resume builder api', () => {
  let store: MemoryDocumentStore;

  beforeEach(() => {
    store = new MemoryDocumentStore();
    Logger.attach(store);
  });

  afterEach(() => {
    Logger.attach(null);
  });

  it('answers on the root path', async () => {
    const res = await request(createApp({ config, store })).get('/');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: 'Resume Builder API running' });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await request(createApp({ config, store })).get('/nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: 'Not Found' });
  });

  it('allows any origin with credentials', async () => {
    const res = await request(createApp({ config, store })).get('/').set('Origin', 'http://somewhere.test');
    expect(res.headers['access-control-allow-origin']).toBe('http://somewhere.test');
    expect(res.headers['access-control-allow-credentials']).toBe('true');
  });

  describe('POST /auth/signin', () => {
    it('returns the same user id and a fresh token on every sign-in', async () => {
      const app = createApp({ config, store });
      const first = await request(app).post('/auth/signin').send({ email: 'dana@example.com', name: 'Dana' });
      const second = await request(app).post('/auth/signin').send({ email: 'dana@example.com' });

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
      expect(second.body.user_id).toBe(first.body.user_id);
      expect(second.body.token).not.toBe(first.body.token);
      expect(typeof first.body.token).toBe('string');
    });

    it('rejects a body without email', async () => {
      const res = await request(createApp({ config, store })).post('/auth/signin').send({ name: 'Dana' });
      expect(res.status).toBe(400);
    });

    it('answers 500 without a store', async () => {
      const res = await request(createApp({ config, store: null })).post('/auth/signin').send({ email: 'dana@example.com' });
      expect(res.status).toBe(500);
      expect(res.body).toEqual({ detail: 'Database not configured' });
    });

    it('logs the sign-in', async () => {
      const res = await request(createApp({ config, store })).post('/auth/signin').send({ email: 'dana@example.com' });
      expect(store.logs).toHaveLength(1);
      expect(store.logs[0]).toMatchObject({ Category: 'Auth', Status: 'SUCCESS', UserID: res.body.user_id });
    });
  });

  describe('POST /upload/extract-text', () => {
    it('returns the text of a plain text upload', async () => {
      const res = await request(createApp({ config, store }))
        .post('/upload/extract-text')
        .attach('file', Buffer.from('hello\nworld'), 'notes.txt');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ text: 'hello\nworld' });
    });

    it('answers 400 when no file is attached', async () => {
      const res = await request(createApp({ config, store })).post('/upload/extract-text').field('note', 'x');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'No file provided' });
    });

    it('answers 400 when the pdf capability is disabled', async () => {
      const app = createApp({ config: { ...config, capabilities: { pdf: false, docx: true } }, store });
      const res = await request(app).post('/upload/extract-text').attach('file', Buffer.from('%PDF-1.4'), 'cv.pdf');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'PDF support not available' });
    });

    it('turns unexpected extractor failures into a 400', async () => {
      const extractor: TextExtractor = {
        extract: async () => {
          throw new TypeError('cannot read xref table');
        },
      };
      const res = await request(createApp({ config, store, extractor }))
        .post('/upload/extract-text')
        .attach('file', Buffer.from('%PDF'), 'cv.pdf');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Failed to read file: cannot read xref table' });
    });

    it('rejects files above the upload limit', async () => {
      const app = createApp({ config: { ...config, maxUploadBytes: 4 }, store });
      const res = await request(app).post('/upload/extract-text').attach('file', Buffer.from('too large'), 'notes.txt');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Upload rejected: File too large' });
    });

    it('answers 500 without a store', async () => {
      const res = await request(createApp({ config, store: null }))
        .post('/upload/extract-text')
        .attach('file', Buffer.from('hello'), 'notes.txt');
      expect(res.status).toBe(500);
    });
  });

  describe('POST /generate', () => {
    it('returns generated content', async () => {
      const res = await request(createApp({ config, store: null }))
        .post('/generate')
        .send({ user_id: 'u1', job_description: 'Senior Backend Engineer at Acme', user_material: 'Built backend services' });

      expect(res.status).toBe(200);
      expect(res.body.title).toBe('Senior Backend Engineer at Acme');
      expect(res.body.bullets).toEqual(['Delivered backend-focused outcomes: Built backend services']);
      expect(Object.keys(res.body).sort()).toEqual(
        ['advice', 'bullets', 'cover_letter', 'footer', 'header', 'summary', 'title']
      );
    });

    it('answers 400 for whitespace-only input', async () => {
      const res = await request(createApp({ config, store }))
        .post('/generate')
        .send({ user_id: 'u1', job_description: '   ', user_material: 'something' });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Both job description and user material are required' });
    });

    it('answers 400 for a missing field', async () => {
      const res = await request(createApp({ config, store })).post('/generate').send({ user_id: 'u1', job_description: 'x' });
      expect(res.status).toBe(400);
      expect(res.body.detail).toMatch(/^user_material: /);
    });
  });

  describe('profiles', () => {
    it('saves a profile and fetches it by share slug', async () => {
      const app = createApp({ config, store });
      const signin = await request(app).post('/auth/signin').send({ email: 'dana@example.com' });

      const saved = await request(app)
        .post('/profile')
        .send({ user_id: signin.body.user_id, content, loom_url: 'https://loom.example/v/1' });
      expect(saved.status).toBe(200);
      expect(saved.body.share_slug).toMatch(/^[0-9a-f]{10}$/);

      const fetched = await request(app).get(`/profile/${saved.body.share_slug}`);
      expect(fetched.status).toBe(200);
      expect(fetched.body).toMatchObject({
        _id: saved.body.profile_id,
        user_id: signin.body.user_id,
        content,
        loom_url: 'https://loom.example/v/1',
        photo_url: null,
        share_slug: saved.body.share_slug,
      });
      expect(typeof fetched.body.created_at).toBe('string');
    });

    it('answers 404 for an unknown slug', async () => {
      const res = await request(createApp({ config, store })).get('/profile/0123456789');
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ detail: 'Profile not found' });
    });

    it('answers 400 for a malformed user id', async () => {
      const res = await request(createApp({ config, store })).post('/profile').send({ user_id: 'not-an-id', content });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Invalid user_id' });
      expect(store.profiles).toHaveLength(0);
    });

    it('accepts a well-formed user id that has no user behind it', async () => {
      const res = await request(createApp({ config, store }))
        .post('/profile')
        .send({ user_id: '6f1c2d9e-8a5b-4c3d-9e7f-1a2b3c4d5e6f', content });
      expect(res.status).toBe(200);
    });

    it('answers 500 without a store', async () => {
      const app = createApp({ config, store: null });
      expect((await request(app).get('/profile/0123456789')).status).toBe(500);
      expect((await request(app).post('/profile').send({ user_id: 'x', content })).status).toBe(500);
    });
  });

  describe('GET /test', () => {
    it('reports a missing store', async () => {
      const res = await request(createApp({ config, store: null })).get('/test');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        backend: '✅ Running',
        database: '❌ Not Available',
        database_url: null,
        database_name: null,
        connection_status: 'Not Connected',
        collections: [],
      });
    });

    it('reports a working store', async () => {
      const res = await request(createApp({ config, store })).get('/test');
      expect(res.body).toEqual({
        backend: '✅ Running',
        database: '✅ Connected & Working',
        database_url: '✅ Set',
        database_name: '❌ Not Set',
        connection_status: 'Connected',
        collections: ['user', 'session', 'profile', 'application_log'],
      });
    });

    it('captures listing failures in the body', async () => {
      store.listCollections = async () => {
        throw new Error('permission denied for schema public while listing tables');
      };
      const res = await request(createApp({ config, store })).get('/test');
      expect(res.status).toBe(200);
      expect(res.body.database).toBe('⚠️ Connected but Error: permission denied for schema public while listing ');
      expect(res.body.collections).toEqual([]);
    });
  });
});
