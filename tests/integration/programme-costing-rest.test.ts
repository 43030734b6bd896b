/**
 * Integration tests for the programme costing endpoints
 */

import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { makeTestApp } from '../fixtures/app.js';

import type { FastifyInstance } from 'fastify';

describe('Programme Costing REST API', () => {
  let app: FastifyInstance;

  const visits = {
    kind: 'per_diem',
    items: [{ label: 'Visits', division: 'district', local: true, travellers: 1, days: 1 }],
  };
  const body = {
    country: 'UGA',
    start_year: 2020,
    end_year: 2020,
    discount_rate: 0,
    desired_currency: 'USD',
    desired_year: 2019,
    modules: [visits],
  };

  beforeAll(async () => {
    app = await makeTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /process', () => {
    it('returns the ledger as a CSV attachment', async () => {
      const response = await app.inject({ method: 'POST', url: '/process', payload: body });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(response.headers['content-disposition']).toBe(
        'attachment; filename="programme-costs.csv"'
      );
      expect(response.body).toBe('year,component,module,cost\n2020,Per diem: Visits,per_diem,10.00\n');
    });

    it('appends yearly totals when summary is requested', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process?summary=true',
        payload: { ...body, end_year: 2021, discount_rate: 0.25 },
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe(
        [
          'year,component,module,cost',
          '2020,Per diem: Visits,per_diem,10.00',
          '2020,Total,,10.00',
          '2021,Per diem: Visits,per_diem,8.00',
          '2021,Total,,8.00',
          '',
        ].join('\n')
      );
    });

    it('costs module identifiers with their templates', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process',
        payload: { ...body, desired_currency: 'I$', modules: ['personnel'] },
      });

      // 30000 I$ 2019, already in the desired base
      expect(response.statusCode).toBe(200);
      expect(response.body).toBe(
        'year,component,module,cost\n2020,Personnel: Manager,personnel,30000.00\n'
      );
    });

    it('returns 400 with the offending field for an unusable configuration', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process',
        payload: { ...body, country: 'XYZ' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ConfigError',
        message: "Unknown country code 'XYZ'",
        field: 'country',
      });
    });

    it('returns 422 when reference data is missing for the country', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process',
        payload: { ...body, country: 'NPL' },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toEqual({
        ok: false,
        error: 'DataGapError',
        message: "per_diem for NPL: No row for 'NPL' in per_diems",
      });
    });

    it('returns 400 for a body that fails the schema', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process',
        payload: { ...body, start_year: 'soon' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ ok: false, error: 'ValidationError' });
    });

    it('rejects unknown module item properties', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process',
        payload: {
          ...body,
          modules: [{ kind: 'personnel', items: [{ label: 'Nurse', cadreLevel: 3, grade: 'B' }] }],
        },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('GET /meta/options', () => {
    it('lists configuration choices', async () => {
      const response = await app.inject({ method: 'GET', url: '/meta/options' });

      expect(response.statusCode).toBe(200);
      const payload = response.json();
      expect(payload.ok).toBe(true);
      expect(payload.data.countries).toEqual(['ARG', 'NPL', 'UGA']);
      expect(payload.data.currencies).toEqual(['I$', 'ARG', 'UGA', 'USA']);
      expect(payload.data.defaults.country).toBe('UGA');
      expect(payload.data.modules).toHaveLength(8);
    });
  });

  it('returns 404 for unknown routes', async () => {
    const response = await app.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: 'NotFoundError',
      message: 'Route GET /nope not found',
    });
  });
});
