import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../src/app';

describe('App', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  describe('GET /', () => {
    it('should describe the API and link its routers', async () => {
      const response = await request(app).get('/');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('success', true);
      expect(response.body).toHaveProperty('message', 'Interunit Loan Reconciliation API');
      expect(response.body).toHaveProperty('ledger', '/api/v1/ledger');
      expect(response.body).toHaveProperty('reconciliation', '/api/v1/reconciliation');
      expect(response.body).toHaveProperty('health', '/api/v1/health');
    });
  });

  describe('404 Handler', () => {
    it('should name the method and path of an unknown route', async () => {
      const response = await request(app).get('/unknown-route');

      expect(response.status).toBe(404);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body).toHaveProperty('error', 'Route not found: GET /unknown-route');
    });

    it('should return 404 for unknown API routes', async () => {
      const response = await request(app).post('/api/v1/unknown');

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('Route not found: POST /api/v1/unknown');
    });
  });

  describe('Security Headers', () => {
    it('should include security headers', async () => {
      const response = await request(app).get('/');

      expect(response.headers).toHaveProperty('x-content-type-options', 'nosniff');
      expect(response.headers).toHaveProperty('x-frame-options');
    });
  });

  describe('CORS', () => {
    it('should answer preflight requests for POST', async () => {
      const response = await request(app)
        .options('/api/v1/reconciliation/reconcile')
        .set('Origin', 'http://localhost:8080')
        .set('Access-Control-Request-Method', 'POST');

      expect(response.status).toBe(204);
      expect(response.headers['access-control-allow-methods']).toBe('GET,POST,OPTIONS');
    });
  });
});
