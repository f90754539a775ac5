/**
 * =============================================================================
 * AUTH MIDDLEWARE - Unit Tests
 * =============================================================================
 *
 * Authentication and the Access Gate mounted on a minimal app.
 * =============================================================================
 */

import express from 'express';
import jwt from 'jsonwebtoken';
import { UserRole } from '../core/constants';
import { DatabaseService } from '../shared/database/db';
import { UserEntity } from '../shared/database/repository.interface';
import { accessGate, createAuthMiddleware, requireCaller } from '../shared/middleware/auth.middleware';
import { errorHandler } from '../shared/middleware/error.middleware';
import { AccessPolicy } from '../shared/security/access-gate';
import { successResponse } from '../shared/types/api.types';
import { createTestStore, seedUser } from './helpers/fixtures';
import { envelope, startTestServer, TestServer } from './helpers/http';

// Mock logger to suppress output during tests
jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    log: jest.fn(),
  },
  logError: jest.fn(),
}));

const SECRET = 'test-secret';

describe('Auth middleware', () => {
  let store: DatabaseService;
  let server: TestServer;

  let admin: UserEntity;
  let driver: UserEntity;
  let retired: UserEntity;

  const tokenFor = (user: UserEntity): string => jwt.sign({ userId: user.id }, SECRET);

  beforeEach(async () => {
    store = createTestStore();
    admin = await seedUser(store, 'ada@example.com', UserRole.ADMIN);
    driver = await seedUser(store, 'abe@example.com', UserRole.DRIVER);
    retired = await seedUser(store, 'old@example.com', UserRole.ADMIN, { isActive: false });

    const authenticate = createAuthMiddleware(store.users, SECRET);
    const app = express();

    app.get('/admin', authenticate, accessGate(AccessPolicy.ADMIN_ONLY), (req, res) => {
      res.json(successResponse(requireCaller(req)));
    });
    app.get('/feed', authenticate, accessGate(AccessPolicy.ADMIN_WRITE_READ_ANY), (_req, res) => {
      res.json(successResponse('read'));
    });
    app.post('/feed', authenticate, accessGate(AccessPolicy.ADMIN_WRITE_READ_ANY), (_req, res) => {
      res.status(201).json(successResponse('written'));
    });
    app.use(errorHandler);

    server = await startTestServer(app);
  });

  afterEach(async () => {
    await server.close();
  });

  // ===========================================================================
  // AUTHENTICATION
  // ===========================================================================

  it('should reject a request without a bearer token', async () => {
    const response = await server.request('GET', '/admin');

    expect(response.status).toBe(401);
    expect(envelope(response).error).toEqual({ code: 'UNAUTHORIZED', message: 'Authentication required' });
  });

  it('should reject a token signed with another secret', async () => {
    const token = jwt.sign({ userId: admin.id }, 'another-secret');
    const response = await server.request('GET', '/admin', { token });

    expect(response.status).toBe(401);
    expect(envelope(response).error?.code).toBe('INVALID_TOKEN');
  });

  it('should reject an expired token', async () => {
    const token = jwt.sign({ userId: admin.id, exp: Math.floor(Date.now() / 1000) - 60 }, SECRET);
    const response = await server.request('GET', '/admin', { token });

    expect(response.status).toBe(401);
    expect(envelope(response).error).toEqual({ code: 'TOKEN_EXPIRED', message: 'Token has expired' });
  });

  it('should reject a token without a user id', async () => {
    const token = jwt.sign({ sub: admin.id }, SECRET);
    const response = await server.request('GET', '/admin', { token });

    expect(envelope(response).error?.code).toBe('INVALID_TOKEN');
  });

  it('should reject deactivated and unknown users', async () => {
    const inactive = await server.request('GET', '/admin', { token: tokenFor(retired) });
    const unknown = await server.request('GET', '/admin', { token: jwt.sign({ userId: 'ghost' }, SECRET) });

    expect(inactive.status).toBe(401);
    expect(envelope(inactive).error?.message).toBe('User inactive or not found');
    expect(unknown.status).toBe(401);
  });

  it('should attach the caller with the stored role', async () => {
    const token = jwt.sign({ userId: admin.id, role: 'rider' }, SECRET);
    const response = await server.request('GET', '/admin', { token });

    expect(response.status).toBe(200);
    expect(envelope(response).data).toEqual({ userId: admin.id, role: 'admin', email: 'ada@example.com' });
  });

  // ===========================================================================
  // ACCESS GATE
  // ===========================================================================

  it('should forbid non-admins on admin-only routes', async () => {
    const response = await server.request('GET', '/admin', { token: tokenFor(driver) });

    expect(response.status).toBe(403);
    expect(envelope(response).error).toEqual({ code: 'FORBIDDEN', message: 'Insufficient permissions' });
  });

  it('should let any caller read but only admins write', async () => {
    const read = await server.request('GET', '/feed', { token: tokenFor(driver) });
    const denied = await server.request('POST', '/feed', { token: tokenFor(driver), body: {} });
    const written = await server.request('POST', '/feed', { token: tokenFor(admin), body: {} });

    expect(read.status).toBe(200);
    expect(denied.status).toBe(403);
    expect(written.status).toBe(201);
  });

  it('should check authentication before the role', async () => {
    const response = await server.request('POST', '/feed');
    expect(response.status).toBe(401);
  });
});
