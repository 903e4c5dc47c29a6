/**
 * @fileoverview HTTP surface of the auth and appointment routes, served on
 * an ephemeral local port over in-memory stores.
 */

import { once } from 'node:events';
import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createApp } from '../../app';
import { AuthService } from '../../services/auth/authService';
import { TokenService } from '../../services/auth/tokens';
import { BookingEngine } from '../../services/booking/bookingEngine';
import { MemoryAuthStore, MemoryBookingStore, TEST_PASSWORD } from '../../__tests__/support/memoryStores';

const NOW = new Date(2030, 0, 7, 8, 0, 0);
const DATE = '2030-01-07';

const TokenPairBody = z.object({
  data: z.object({ access_token: z.string(), refresh_token: z.string() }),
});

const AppointmentBody = z.object({
  data: z.object({ appointment_id: z.string() }),
});

const ListBody = z.object({
  data: z.array(z.object({ identifier: z.string().optional(), patient_id: z.string().optional() })),
});

interface ApiResponse {
  status: number;
  body: unknown;
}

describe('API routes', () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const bookingStore = new MemoryBookingStore()
      .addDoctor('DOC-1')
      .addWindow('DOC-1', 0, '09:00', '12:00')
      .addWindow('DOC-1', 0, '13:00', '17:00', { break_start_time: '15:00', break_end_time: '15:30' });
    const authStore = new MemoryAuthStore();
    authStore.addUser({ user_id: 'u-pat-1', email: 'patient@example.test', role: 'patient', profile_id: 'PAT-1' });
    authStore.addUser({ user_id: 'u-desk', email: 'desk@example.test', role: 'receptionist' });
    authStore.addUser({ user_id: 'u-admin', email: 'admin@example.test', role: 'admin' });

    const now = () => NOW;
    const app = createApp(
      {
        auth: new AuthService({
          store: authStore,
          tokens: new TokenService({ secret: 'test-secret-signing-key', accessTtlSeconds: 900, refreshTtlSeconds: 3600 }),
          lockout: { maxFailedLogins: 5, lockoutMinutes: 30 },
          now,
        }),
        booking: new BookingEngine({ store: bookingStore, now }),
      },
      { corsOrigin: '*' }
    );

    server = app.listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server did not bind to a TCP port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  async function call(method: string, path: string, body?: unknown, token?: string): Promise<ApiResponse> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (token) headers.authorization = `Bearer ${token}`;
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const payload: unknown = await res.json();
    return { status: res.status, body: payload };
  }

  async function login(email: string) {
    const res = await call('POST', '/api/auth/login', { email, password: TEST_PASSWORD });
    expect(res.status).toBe(200);
    return TokenPairBody.parse(res.body).data;
  }

  const booking = (overrides: Record<string, unknown> = {}) => ({
    doctor_id: 'DOC-1',
    date: DATE,
    time_start: '09:00',
    duration_minutes: 30,
    reason: 'Persistent cough',
    ...overrides,
  });

  it('should answer the health route', async () => {
    const res = await fetch(`${baseUrl}/`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('API is running...');
  });

  describe('auth', () => {
    it('should reject a wrong password with the generic message', async () => {
      const res = await call('POST', '/api/auth/login', { email: 'desk@example.test', password: 'wrong-password' });

      expect(res).toEqual({
        status: 401,
        body: { success: false, code: 'AUTHENTICATION_FAILED', message: 'Invalid credentials' },
      });
    });

    it('should require email and password', async () => {
      const res = await call('POST', '/api/auth/login', { email: 'desk@example.test' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        success: false,
        code: 'VALIDATION_ERROR',
        message: 'email and password required',
        issues: [{ field: 'password', message: 'Required' }],
      });
    });

    it('should reject a body that is not JSON', async () => {
      const res = await fetch(`${baseUrl}/api/auth/login`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{"email":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        code: 'VALIDATION_ERROR',
        message: 'Request body is not valid JSON',
      });
    });

    it('should verify an access token', async () => {
      const { access_token } = await login('desk@example.test');

      const res = await call('POST', '/api/auth/verify', { token: access_token });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ success: true, data: { sub: 'u-desk', role: 'receptionist' } });
    });

    it('should refuse to refresh after logout', async () => {
      const { refresh_token } = await login('desk@example.test');

      const logout = await call('POST', '/api/auth/logout', { refresh_token });
      const refresh = await call('POST', '/api/auth/refresh', { refresh_token });

      expect(logout.body).toEqual({ success: true, message: 'Successfully logged out' });
      expect(refresh).toEqual({
        status: 401,
        body: { success: false, code: 'INVALID_TOKEN', message: 'Session has been revoked' },
      });
    });
  });

  describe('sessions and activities', () => {
    it('should require a bearer token', async () => {
      const res = await call('GET', '/api/auth/sessions');
      expect(res.status).toBe(401);
    });

    it('should list the caller sessions', async () => {
      await login('patient@example.test');
      const { access_token } = await login('desk@example.test');

      const res = await call('GET', '/api/auth/sessions', undefined, access_token);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ success: true, data: [{ user_id: 'u-desk', revoked: false }] });
    });

    it('should limit activities to the caller unless they are an admin', async () => {
      await login('desk@example.test');
      const patient = await login('patient@example.test');
      const admin = await login('admin@example.test');

      const own = await call('GET', '/api/auth/activities', undefined, patient.access_token);
      const all = await call('GET', '/api/auth/activities', undefined, admin.access_token);

      expect(ListBody.parse(own.body).data.map((a) => a.identifier)).toEqual(['patient@example.test']);
      expect(ListBody.parse(all.body).data.map((a) => a.identifier)).toEqual([
        'admin@example.test',
        'patient@example.test',
        'desk@example.test',
      ]);
    });
  });

  describe('appointments', () => {
    it('should require a bearer token', async () => {
      const res = await call('POST', '/api/appointments', booking());

      expect(res).toEqual({
        status: 401,
        body: { success: false, code: 'INVALID_TOKEN', message: 'Authentication credentials were not provided' },
      });
    });

    it('should reject a garbage bearer token', async () => {
      const res = await call('GET', `/api/appointments/availability?doctor_id=DOC-1&date=${DATE}`, undefined, 'nope');

      expect(res.status).toBe(401);
      expect(res.body).toMatchObject({ code: 'INVALID_TOKEN', message: 'Token is invalid' });
    });

    it('should book for the logged-in patient and report conflicts', async () => {
      const patient = await login('patient@example.test');
      const desk = await login('desk@example.test');

      const created = await call('POST', '/api/appointments', booking(), patient.access_token);
      const clash = await call(
        'POST',
        '/api/appointments',
        booking({ patient_id: 'PAT-2', time_start: '09:15' }),
        desk.access_token
      );

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({
        success: true,
        data: { patient_id: 'PAT-1', status: 'scheduled', time_start: '09:00', time_end: '09:30', created_by: 'u-pat-1' },
      });
      expect(clash).toEqual({
        status: 409,
        body: {
          success: false,
          code: 'SLOT_CONFLICT',
          message: 'This appointment overlaps with an existing appointment from 09:00 to 09:30',
        },
      });
    });

    it('should report invalid booking fields', async () => {
      const { access_token } = await login('patient@example.test');

      const res = await call('POST', '/api/appointments', booking({ duration_minutes: -10 }), access_token);

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({
        success: false,
        code: 'VALIDATION_ERROR',
        message: 'Invalid booking request',
        issues: [{ field: 'duration_minutes' }],
      });
    });

    it('should answer 422 outside the working hours', async () => {
      const { access_token } = await login('patient@example.test');

      const res = await call('POST', '/api/appointments', booking({ time_start: '18:00' }), access_token);

      expect(res.status).toBe(422);
      expect(res.body).toMatchObject({ code: 'NOT_AVAILABLE' });
    });

    it('should list free intervals', async () => {
      const { access_token } = await login('patient@example.test');
      await call('POST', '/api/appointments', booking({ time_start: '10:00', duration_minutes: 60 }), access_token);

      const res = await call('GET', `/api/appointments/availability?doctor_id=DOC-1&date=${DATE}`, undefined, access_token);

      expect(res).toEqual({
        status: 200,
        body: {
          success: true,
          data: {
            doctor_id: 'DOC-1',
            date: DATE,
            available: [
              { start: '09:00', end: '10:00' },
              { start: '11:00', end: '12:00' },
              { start: '13:00', end: '15:00' },
              { start: '15:30', end: '17:00' },
            ],
          },
        },
      });
    });

    it('should require doctor_id and date for availability', async () => {
      const { access_token } = await login('patient@example.test');

      const res = await call('GET', '/api/appointments/availability?doctor_id=DOC-1', undefined, access_token);

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ message: 'doctor_id and date parameters are required' });
    });

    it('should cancel once and refuse a second cancellation', async () => {
      const { access_token } = await login('patient@example.test');
      const created = await call('POST', '/api/appointments', booking(), access_token);
      const { appointment_id } = AppointmentBody.parse(created.body).data;

      const first = await call(
        'PUT',
        `/api/appointments/${appointment_id}/status`,
        { status: 'cancelled', reason: 'Travelling' },
        access_token
      );
      const second = await call('PUT', `/api/appointments/${appointment_id}/status`, { status: 'cancelled' }, access_token);
      const fetched = await call('GET', `/api/appointments/${appointment_id}`, undefined, access_token);

      expect(first.status).toBe(200);
      expect(first.body).toMatchObject({
        success: true,
        message: 'Appointment cancelled successfully',
        data: { status: 'cancelled', cancelled_by: 'patient', cancellation_reason: 'Travelling' },
      });
      expect(second).toEqual({
        status: 409,
        body: {
          success: false,
          code: 'INVALID_TRANSITION',
          message: 'Cannot change appointment status from cancelled to cancelled',
        },
      });
      expect(fetched.body).toMatchObject({ data: { appointment_id, status: 'cancelled' } });
    });

    it('should list appointments within the caller scope', async () => {
      const patient = await login('patient@example.test');
      const desk = await login('desk@example.test');
      await call('POST', '/api/appointments', booking(), patient.access_token);
      await call('POST', '/api/appointments', booking({ patient_id: 'PAT-2', time_start: '10:00' }), desk.access_token);

      const own = await call('GET', '/api/appointments', undefined, patient.access_token);
      const all = await call('GET', `/api/appointments?date=${DATE}`, undefined, desk.access_token);
      const bad = await call('GET', '/api/appointments?status=pending', undefined, desk.access_token);

      expect(own.status).toBe(200);
      expect(ListBody.parse(own.body).data.map((a) => a.patient_id)).toEqual(['PAT-1']);
      expect(ListBody.parse(all.body).data.map((a) => a.patient_id)).toEqual(['PAT-1', 'PAT-2']);
      expect(bad.status).toBe(400);
    });

    it('should answer 404 for an unknown appointment', async () => {
      const { access_token } = await login('desk@example.test');

      const res = await call('GET', '/api/appointments/APT-000000000000', undefined, access_token);

      expect(res).toEqual({
        status: 404,
        body: { success: false, code: 'NOT_FOUND', message: 'Appointment not found' },
      });
    });
  });
});
