import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../../errors';
import {
  parseAppointmentListQuery,
  parseAvailabilityQuery,
  parseBookingRequest,
  parseTransitionRequest,
} from '../validation';

const validBody = {
  doctor_id: 'DOC-1',
  patient_id: 'PAT-1',
  date: '2030-01-07',
  time_start: '09:00',
  reason: 'Follow-up visit',
};

function issuesOf(fn: () => unknown) {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.issues.map((i) => i.field);
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('parseBookingRequest', () => {
  it('should apply defaults for duration and appointment type', () => {
    expect(parseBookingRequest(validBody)).toEqual({
      ...validBody,
      duration_minutes: 30,
      appointment_type: null,
    });
  });

  it('should trim identifiers and reason', () => {
    const parsed = parseBookingRequest({ ...validBody, doctor_id: '  DOC-1 ', reason: ' Follow-up visit  ' });
    expect(parsed.doctor_id).toBe('DOC-1');
    expect(parsed.reason).toBe('Follow-up visit');
  });

  it('should reject a negative duration', () => {
    expect(issuesOf(() => parseBookingRequest({ ...validBody, duration_minutes: -15 }))).toEqual(['duration_minutes']);
  });

  it('should reject a date that does not exist', () => {
    expect(issuesOf(() => parseBookingRequest({ ...validBody, date: '2030-02-30' }))).toEqual(['date']);
  });

  it('should reject a start time without a leading zero', () => {
    expect(issuesOf(() => parseBookingRequest({ ...validBody, time_start: '9:00' }))).toEqual(['time_start']);
  });

  it('should reject an appointment running past midnight', () => {
    expect(issuesOf(() => parseBookingRequest({ ...validBody, time_start: '23:45', duration_minutes: 30 }))).toEqual([
      'duration_minutes',
    ]);
  });

  it('should report every missing field', () => {
    expect(issuesOf(() => parseBookingRequest({}))).toEqual(['doctor_id', 'patient_id', 'date', 'time_start', 'reason']);
  });

  it('should reject a non-object body', () => {
    expect(issuesOf(() => parseBookingRequest('book me'))).toEqual(['(root)']);
  });
});

describe('parseTransitionRequest', () => {
  it('should accept a cancellation with a reason', () => {
    expect(parseTransitionRequest({ status: 'cancelled', reason: 'Feeling better' })).toEqual({
      status: 'cancelled',
      reason: 'Feeling better',
    });
  });

  it('should not accept scheduled as a target status', () => {
    expect(issuesOf(() => parseTransitionRequest({ status: 'scheduled' }))).toEqual(['status']);
  });
});

describe('parseAvailabilityQuery', () => {
  it('should require both doctor_id and date', () => {
    expect(issuesOf(() => parseAvailabilityQuery({ doctor_id: 'DOC-1' }))).toEqual(['date']);
  });

  it('should reject repeated query parameters', () => {
    expect(issuesOf(() => parseAvailabilityQuery({ doctor_id: ['DOC-1', 'DOC-2'], date: '2030-01-07' }))).toEqual([
      'doctor_id',
    ]);
  });
});

describe('parseAppointmentListQuery', () => {
  it('should accept an empty query', () => {
    expect(parseAppointmentListQuery({})).toEqual({});
  });

  it('should reject an unknown status', () => {
    expect(issuesOf(() => parseAppointmentListQuery({ status: 'pending' }))).toEqual(['status']);
  });
});
