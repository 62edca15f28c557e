import request from 'supertest';
import app from '../../api/server';
import { minimalValidRequest, requestWithOverrides } from '../fixtures/requests';

describe('GET /api', () => {
  it('should return API information', async () => {
    const response = await request(app).get('/api');

    expect(response.status).toBe(200);
    expect(response.body.message).toBeDefined();
    expect(response.body.endpoints.calculate).toBeDefined();
    expect(response.body.endpoints.tiers).toBeDefined();
  });
});

describe('GET /', () => {
  it('should list the same endpoints as GET /api', async () => {
    const root = await request(app).get('/');
    const api = await request(app).get('/api');

    expect(root.status).toBe(200);
    expect(Object.keys(root.body.endpoints)).toHaveLength(7);
    expect(root.body.endpoints).toEqual(api.body.endpoints);
  });
});

describe('GET /api/health', () => {
  it('should return status ok with timestamp', async () => {
    const response = await request(app).get('/api/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
    expect(response.body.timestamp).toBeDefined();
  });
});

describe('GET /api/tiers', () => {
  it('should return the pricing table with an open upper bound as null', async () => {
    const response = await request(app).get('/api/tiers');

    expect(response.status).toBe(200);
    expect(response.body.tiers).toEqual([
      { name: 'Small', lowerBoundUsd: 0, upperBoundUsd: 25000000, annualPriceUsd: 12000 },
      { name: 'Middle market', lowerBoundUsd: 25000000, upperBoundUsd: 50000000, annualPriceUsd: 60000 },
      { name: 'Enterprise', lowerBoundUsd: 50000000, upperBoundUsd: null, annualPriceUsd: 100000 },
    ]);
  });
});

describe('GET /api/tiers/resolve', () => {
  it('should resolve a boundary revenue to the higher tier', async () => {
    const response = await request(app).get('/api/tiers/resolve').query({ annualRevenue: '25000000' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ tier: 'Middle market', annualPriceUsd: 60000 });
  });

  it('should return 400 for a missing annualRevenue', async () => {
    const response = await request(app).get('/api/tiers/resolve');

    expect(response.status).toBe(400);
    expect(response.body.error).toBeDefined();
  });

  it('should return 400 for a non-numeric annualRevenue', async () => {
    const response = await request(app).get('/api/tiers/resolve?annualRevenue=abc');

    expect(response.status).toBe(400);
  });
});

describe('GET /api/industries', () => {
  it('should list supported industries', async () => {
    const response = await request(app).get('/api/industries');

    expect(response.status).toBe(200);
    expect(response.body.industries).toHaveLength(4);
    expect(response.body.industries[0]).toBe('Retail Distributors');
  });
});

describe('GET /api/industries/:industry/benchmark', () => {
  it('should return the benchmark for an encoded industry name', async () => {
    const industry = encodeURIComponent('Hospitals/Healthcare Facilities');
    const response = await request(app).get(`/api/industries/${industry}/benchmark`);

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      industry: 'Hospitals/Healthcare Facilities',
      benchmarkDsoDays: 53,
    });
  });

  it('should return 404 for an unknown industry', async () => {
    const response = await request(app).get('/api/industries/Nonexistent/benchmark');

    expect(response.status).toBe(404);
    expect(response.body.error).toBe('No benchmark data for industry: Nonexistent');
  });

  it('should return 400 for a badly encoded industry name', async () => {
    const response = await request(app).get('/api/industries/%E0%A4%A/benchmark');

    expect(response.status).toBe(400);
    expect(response.body.error).toBe("Failed to decode param '%E0%A4%A'");
  });
});

describe('GET /api/assumptions/defaults', () => {
  it('should return the default assumptions', async () => {
    const response = await request(app).get('/api/assumptions/defaults');

    expect(response.status).toBe(200);
    expect(response.body.workingDaysPerYear).toBe(365);
    expect(response.body.costOfCapitalAnnualPct).toBe(0.045);
  });
});

describe('GET /api/roi/calculate', () => {
  it('should return endpoint information', async () => {
    const response = await request(app).get('/api/roi/calculate');

    expect(response.status).toBe(200);
    expect(response.body.method).toBe('POST');
    expect(response.body.endpoint).toBe('/api/roi/calculate');
    expect(response.body.requiredFields).toBeDefined();
  });
});

describe('POST /api/roi/calculate', () => {
  it('should return results for a valid request', async () => {
    const response = await request(app)
      .post('/api/roi/calculate')
      .send(minimalValidRequest);

    expect(response.status).toBe(200);
    expect(response.body.results.tier).toBe('Small');
    expect(response.body.results.annualPriceUsd).toBe(12000);
    expect(response.body.results.roiPct).toBeCloseTo(735.6164, 4);
    expect(response.body.totalBenefitUsd).toBeCloseTo(100273.97, 2);
    expect(response.body.dsoComparison).toEqual({
      industry: 'Hospitals/Healthcare Facilities',
      benchmarkDsoDays: 53,
      differenceDays: 12,
      position: 'above',
    });
    expect(response.body.summary[7]).toBe('ROI: 735.6%');
  });

  it('should apply assumption overrides', async () => {
    const response = await request(app)
      .post('/api/roi/calculate')
      .send(requestWithOverrides);

    expect(response.status).toBe(200);
    expect(response.body.assumptions.productivityTimeSavedPct).toBe(0.25);
    expect(response.body.assumptions.workingDaysPerYear).toBe(365);
    expect(response.body.results.productivityHoursSaved).toBeCloseTo(1200, 5);
  });

  it('should return a null comparison for an unknown industry', async () => {
    const response = await request(app)
      .post('/api/roi/calculate')
      .send({ inputs: { ...minimalValidRequest.inputs, industry: 'Nonexistent' } });

    expect(response.status).toBe(200);
    expect(response.body.dsoComparison).toBeNull();
  });

  it('should return 400 for an empty body', async () => {
    const response = await request(app)
      .post('/api/roi/calculate')
      .send({});

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Invalid request body');
    expect(response.body.issues).toBeDefined();
  });

  it('should return 400 for zero working days', async () => {
    const response = await request(app)
      .post('/api/roi/calculate')
      .send({ ...minimalValidRequest, assumptions: { workingDaysPerYear: 0 } });

    expect(response.status).toBe(400);
  });

  it('should return 400 for malformed JSON', async () => {
    const response = await request(app)
      .post('/api/roi/calculate')
      .set('Content-Type', 'application/json')
      .send('{"inputs":');

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Malformed JSON body');
  });

  it('should return 413 for a body over the size limit', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const response = await request(app)
      .post('/api/roi/calculate')
      .send({ inputs: { ...minimalValidRequest.inputs, industry: 'x'.repeat(200 * 1024) } });

    expect(response.status).toBe(413);
    expect(response.body.error).toBe('request entity too large');
    expect(errorSpy).not.toHaveBeenCalled();
    errorSpy.mockRestore();
  });
});
