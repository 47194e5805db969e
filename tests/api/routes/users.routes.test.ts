/**
 * User API Routes Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { createApp } from '../../../src/api/server.js';
import { parseConfig } from '../../../src/config.js';
import { UserRegistry } from '../../../src/services/users/index.js';

// =============================================================================
// Test Setup
// =============================================================================

const CREATED_AT = new Date('2026-03-01T12:00:00.000Z');

const john = { name: 'John Doe', email: 'john@example.com', age: 30 };

function buildApp(): { app: Application; registry: UserRegistry } {
  const registry = new UserRegistry({ now: () => CREATED_AT });
  const config = parseConfig({ LOG_LEVEL: 'silent' });
  return { app: createApp({ config, registry }), registry };
}

describe('Users API', () => {
  let app: Application;
  let registry: UserRegistry;

  beforeEach(() => {
    ({ app, registry } = buildApp());
  });

  // ===========================================================================
  // POST /users/
  // ===========================================================================

  describe('POST /users/', () => {
    it('creates a user and returns 201 with the stored record', async () => {
      const res = await request(app).post('/users/').send(john);

      expect(res.status).toBe(201);
      expect(res.body).toEqual({
        id: 1,
        name: 'John Doe',
        email: 'john@example.com',
        age: 30,
        created_at: '2026-03-01T12:00:00.000Z',
        is_active: true,
      });
    });

    it('accepts the path without a trailing slash', async () => {
      const res = await request(app).post('/users').send(john);

      expect(res.status).toBe(201);
      expect(res.body.id).toBe(1);
    });

    it('returns 400 for a duplicate email', async () => {
      await request(app).post('/users/').send(john);

      const res = await request(app)
        .post('/users/')
        .send({ ...john, name: 'Jane Doe' });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('EMAIL_ALREADY_REGISTERED');
      expect(res.body.message).toBe('Email already registered');
      expect(registry.size).toBe(1);
    });

    it('returns 400 with field errors for an out-of-range age', async () => {
      const res = await request(app)
        .post('/users/')
        .send({ ...john, age: -5 });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('VALIDATION_ERROR');
      expect(res.body.details.fields).toEqual({ age: ['Age must be at least 0'] });
    });

    it('returns 400 when required fields are missing', async () => {
      const res = await request(app).post('/users/').send({});

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('VALIDATION_ERROR');
      expect(Object.keys(res.body.details.fields).sort()).toEqual(['age', 'email', 'name']);
    });

    it('returns 400 for a malformed JSON body', async () => {
      const res = await request(app)
        .post('/users/')
        .set('Content-Type', 'application/json')
        .send('{"name": ');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('BAD_REQUEST');
      expect(res.body.message).toBe('Malformed JSON body');
    });

    it('ignores unknown fields such as a caller-supplied id', async () => {
      const res = await request(app)
        .post('/users/')
        .send({ ...john, id: 99, is_active: false });

      expect(res.status).toBe(201);
      expect(res.body.id).toBe(1);
      expect(res.body.is_active).toBe(true);
    });
  });

  // ===========================================================================
  // GET /users/
  // ===========================================================================

  describe('GET /users/', () => {
    it('returns an empty array when no users exist', async () => {
      const res = await request(app).get('/users/');

      expect(res.status).toBe(200);
      expect(res.body).toEqual([]);
    });

    it('returns users in creation order', async () => {
      registry.create(john);
      registry.create({ name: 'Jane Smith', email: 'jane@example.com', age: 25 });

      const res = await request(app).get('/users/');

      expect(res.status).toBe(200);
      expect(res.body.map((u: { email: string }) => u.email)).toEqual([
        'john@example.com',
        'jane@example.com',
      ]);
    });

    it('paginates with skip and limit', async () => {
      for (let i = 1; i <= 5; i++) {
        registry.create({ name: `User ${i}`, email: `user${i}@example.com`, age: 20 + i });
      }

      const res = await request(app).get('/users/?skip=2&limit=2');

      expect(res.status).toBe(200);
      expect(res.body.map((u: { id: number }) => u.id)).toEqual([3, 4]);
    });

    it('returns 400 for a non-integer limit', async () => {
      const res = await request(app).get('/users/?limit=ten');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('VALIDATION_ERROR');
    });

    it('returns 400 for an empty limit instead of treating it as zero', async () => {
      registry.create(john);
      registry.create({ name: 'Jane Smith', email: 'jane@example.com', age: 25 });

      const res = await request(app).get('/users/?limit=');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('VALIDATION_ERROR');
      expect(res.body.details.fields).toEqual({ limit: ['Must be an integer'] });
    });

    it('returns 400 for hexadecimal and exponent query values', async () => {
      registry.create(john);

      for (const query of ['limit=0x1', 'skip=1e0', 'skip=%201']) {
        const res = await request(app).get(`/users/?${query}`);

        expect(res.status).toBe(400);
        expect(res.body.error).toBe('VALIDATION_ERROR');
      }
    });
  });

  // ===========================================================================
  // GET /users/:id
  // ===========================================================================

  describe('GET /users/:id', () => {
    it('returns the user', async () => {
      registry.create(john);

      const res = await request(app).get('/users/1');

      expect(res.status).toBe(200);
      expect(res.body.name).toBe('John Doe');
      expect(res.body.email).toBe('john@example.com');
    });

    it('returns 404 for an unknown id', async () => {
      const res = await request(app).get('/users/999');

      expect(res.status).toBe(404);
      expect(res.body.error).toBe('NOT_FOUND');
      expect(res.body.message).toBe('User not found');
    });

    it('returns 400 for a non-numeric id', async () => {
      const res = await request(app).get('/users/abc');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('VALIDATION_ERROR');
    });

    it('returns 400 for ids that are not plain decimal integers', async () => {
      registry.create(john);

      for (const id of ['0x1', '1.5', '1e0', '1.0']) {
        const res = await request(app).get(`/users/${id}`);

        expect(res.status).toBe(400);
        expect(res.body.details.fields).toEqual({ id: ['Must be an integer'] });
      }
    });
  });

  // ===========================================================================
  // PUT / PATCH /users/:id
  // ===========================================================================

  describe('PUT /users/:id', () => {
    beforeEach(() => {
      registry.create(john);
      registry.create({ name: 'Jane Smith', email: 'jane@example.com', age: 25 });
    });

    it('updates only the supplied fields', async () => {
      const res = await request(app).put('/users/1').send({ name: 'John Smith', age: 31 });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        id: 1,
        name: 'John Smith',
        email: 'john@example.com',
        age: 31,
        created_at: '2026-03-01T12:00:00.000Z',
        is_active: true,
      });
    });

    it('maps is_active onto the record', async () => {
      const res = await request(app).put('/users/2').send({ is_active: false });

      expect(res.status).toBe(200);
      expect(res.body.is_active).toBe(false);
      expect(registry.get(2).isActive).toBe(false);
    });

    it('returns the unchanged record for an empty body', async () => {
      const res = await request(app).put('/users/1').send({});

      expect(res.status).toBe(200);
      expect(res.body.name).toBe('John Doe');
      expect(res.body.age).toBe(30);
    });

    it('returns 400 when the email belongs to another user', async () => {
      const res = await request(app).put('/users/1').send({ email: 'jane@example.com' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Email already registered');
      expect(registry.get(1).email).toBe('john@example.com');
    });

    it('returns 400 for an invalid name', async () => {
      const res = await request(app).put('/users/1').send({ name: '' });

      expect(res.status).toBe(400);
      expect(res.body.details.fields).toEqual({ name: ['Name must not be empty'] });
    });

    it('returns 404 for an unknown id', async () => {
      const res = await request(app).put('/users/999').send({ name: 'Nobody' });

      expect(res.status).toBe(404);
    });

    it('ignores a supplied id and created_at and keeps the stored ones', async () => {
      const res = await request(app)
        .put('/users/1')
        .send({ id: 9, created_at: '2000-01-01T00:00:00.000Z', name: 'John Smith' });

      expect(res.status).toBe(200);
      expect(res.body.id).toBe(1);
      expect(res.body.name).toBe('John Smith');
      expect(res.body.created_at).toBe('2026-03-01T12:00:00.000Z');

      const stored = registry.get(1);
      expect(stored.id).toBe(1);
      expect(stored.createdAt).toEqual(CREATED_AT);
      expect(registry.size).toBe(2);
      expect(() => registry.get(9)).toThrow('User not found');
    });
  });

  describe('PATCH /users/:id', () => {
    it('behaves as a partial update', async () => {
      registry.create(john);

      const res = await request(app).patch('/users/1').send({ age: 45 });

      expect(res.status).toBe(200);
      expect(res.body.age).toBe(45);
      expect(res.body.name).toBe('John Doe');
    });

    it('leaves the stored id and created_at alone', async () => {
      registry.create(john);

      const res = await request(app)
        .patch('/users/1')
        .send({ id: 9, created_at: '2000-01-01T00:00:00.000Z' });

      expect(res.status).toBe(200);
      expect(res.body.id).toBe(1);
      expect(res.body.created_at).toBe('2026-03-01T12:00:00.000Z');

      const missing = await request(app).get('/users/9');
      expect(missing.status).toBe(404);
    });
  });

  // ===========================================================================
  // DELETE /users/:id
  // ===========================================================================

  describe('DELETE /users/:id', () => {
    it('returns 204 and removes the user', async () => {
      registry.create(john);

      const res = await request(app).delete('/users/1');

      expect(res.status).toBe(204);
      expect(registry.size).toBe(0);
    });

    it('returns 404 for an unknown id', async () => {
      const res = await request(app).delete('/users/5');

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('User not found');
    });
  });

  // ===========================================================================
  // End-to-end lifecycle
  // ===========================================================================

  describe('user lifecycle', () => {
    it('creates, rejects a duplicate, reads, updates and deletes', async () => {
      const created = await request(app).post('/users/').send(john);
      expect(created.status).toBe(201);
      expect(created.body.id).toBe(1);
      expect(created.body.is_active).toBe(true);

      const duplicate = await request(app).post('/users/').send(john);
      expect(duplicate.status).toBe(400);
      expect(duplicate.body.message).toBe('Email already registered');

      const fetched = await request(app).get('/users/1');
      expect(fetched.status).toBe(200);
      expect(fetched.body).toEqual(created.body);

      const updated = await request(app).put('/users/1').send({ name: 'John Smith', age: 31 });
      expect(updated.status).toBe(200);
      expect(updated.body.email).toBe('john@example.com');
      expect(updated.body.name).toBe('John Smith');
      expect(updated.body.age).toBe(31);

      const deleted = await request(app).delete('/users/1');
      expect(deleted.status).toBe(204);

      const missing = await request(app).get('/users/1');
      expect(missing.status).toBe(404);
    });
  });
});
