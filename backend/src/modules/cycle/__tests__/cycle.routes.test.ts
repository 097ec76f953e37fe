import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../../app.js';
import { PHASE_DETAILS } from '../cycle.constants.js';

const NOW = new Date('2024-03-10T12:00:00Z');

describe('GET /cycle/day-info', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = buildApp({ logger: false, now: () => NOW });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  const get = (url: string) => app.inject({ method: 'GET', url });

  it('returns day info for explicit parameters', async () => {
    const res = await get(
      '/cycle/day-info?query_date=2024-03-10&last_period_start_date=2024-02-15&cycle_length=28&period_length=5'
    );

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      date: '2024-03-10',
      cycleDay: 25,
      phase: 'luteal',
      details: null,
    });
  });

  it('defaults to today and an anchor 28 days earlier', async () => {
    const res = await get('/cycle/day-info');

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      date: '2024-03-10',
      cycleDay: 1,
      phase: 'menstrual',
      details: null,
    });
  });

  it('includes phase details on request', async () => {
    const res = await get('/cycle/day-info?include_details=true');

    expect(res.statusCode).toBe(200);
    expect(res.json().details).toEqual(PHASE_DETAILS.menstrual);
  });

  it('accepts other boolean spellings', async () => {
    const on = await get('/cycle/day-info?include_details=ON');
    const off = await get('/cycle/day-info?include_details=0');

    expect(on.json().details).toEqual(PHASE_DETAILS.menstrual);
    expect(off.json().details).toBeNull();
  });

  it('returns identical bodies for identical requests', async () => {
    const url = '/cycle/day-info?query_date=2024-04-01&last_period_start_date=2024-02-15&include_details=true';
    const first = await get(url);
    const second = await get(url);

    expect(first.body).toBe(second.body);
  });

  describe('client errors', () => {
    it('rejects a last period start date after the target with 400', async () => {
      const res = await get('/cycle/day-info?last_period_start_date=2025-03-10');

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ detail: 'The last period start date cannot be in the future.' });
    });

    it('maps calculator errors to 400', async () => {
      const res = await get('/cycle/day-info?query_date=2024-01-01');

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        detail: 'Error calculating day info: Target date can not be before the last period start date.',
      });
    });

    it('maps a period longer than the cycle to 400', async () => {
      const res = await get('/cycle/day-info?period_length=30');

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        detail: 'Error calculating day info: Period length cannot be longer than cycle length.',
      });
    });

    it('rejects cycle_length above 35 with 422', async () => {
      const res = await get('/cycle/day-info?cycle_length=40');

      expect(res.statusCode).toBe(422);
      const [issue] = res.json().detail;
      expect(issue.loc).toEqual(['query', 'cycle_length']);
      expect(issue.type).toBe('too_big');
    });

    it('rejects period_length below 1 with 422', async () => {
      const res = await get('/cycle/day-info?period_length=0');

      expect(res.statusCode).toBe(422);
      const [issue] = res.json().detail;
      expect(issue.loc).toEqual(['query', 'period_length']);
      expect(issue.type).toBe('too_small');
    });

    it('rejects integers that are not plain decimal digits with 422', async () => {
      for (const raw of ['0x1C', '%2028', '28.0', '2.8e1']) {
        const res = await get(`/cycle/day-info?cycle_length=${raw}`);

        expect(res.statusCode).toBe(422);
        expect(res.json().detail).toEqual([
          { loc: ['query', 'cycle_length'], msg: 'Expected an integer', type: 'invalid_string' },
        ]);
      }
    });

    it('range-checks negative integers after parsing', async () => {
      const res = await get('/cycle/day-info?period_length=-1');

      expect(res.statusCode).toBe(422);
      const [issue] = res.json().detail;
      expect(issue.loc).toEqual(['query', 'period_length']);
      expect(issue.type).toBe('too_small');
    });

    it('rejects impossible dates with 422', async () => {
      const res = await get('/cycle/day-info?query_date=2024-02-30');

      expect(res.statusCode).toBe(422);
      expect(res.json().detail).toEqual([
        {
          loc: ['query', 'query_date'],
          msg: 'Expected a valid date in YYYY-MM-DD format',
          type: 'custom',
        },
      ]);
    });

    it('rejects unknown boolean values with 422', async () => {
      const res = await get('/cycle/day-info?include_details=maybe');

      expect(res.statusCode).toBe(422);
      const [issue] = res.json().detail;
      expect(issue.loc).toEqual(['query', 'include_details']);
      expect(issue.type).toBe('invalid_enum_value');
    });
  });
});

describe('service routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = buildApp({ logger: false, now: () => NOW });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /health reports the clock', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, timestamp: '2024-03-10T12:00:00.000Z' });
  });

  it('unknown routes return 404', async () => {
    const res = await app.inject({ method: 'GET', url: '/cycle/unknown' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ detail: 'Not Found' });
  });
});
