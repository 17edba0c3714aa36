import { describe, it, expect, beforeEach } from 'vitest';
import { ConsoleService } from '../core/console/ConsoleService';
import { handleCheck, handleGetSection, handleHealth, handleInfo, handleListSections, parseLoads } from './routes';

const loads = { Pu: 30000, Mux: 0, Muy: 0, L: 300, Lx: 300, Ly: 300, Lt: 300 };

describe('api routes', () => {
  beforeEach(() => {
    ConsoleService.clear();
  });

  it('answers health and info', () => {
    expect(handleHealth()).toEqual({ status: 200, body: { status: 'ok', version: '1.0.0' } });
    const info = handleInfo();
    expect(info.body.endpoints.map(e => `${e.method} ${e.path}`)).toEqual([
      'GET /api/health',
      'GET /api/info',
      'GET /api/sections',
      'GET /api/sections/<designation>',
      'POST /api/check',
    ]);
  });

  it('lists sections by series', () => {
    const r = handleListSections('W8');
    expect(r.status).toBe(200);
    expect(r.body.count).toBe(13);
    expect(handleListSections(null).body.count).toBe(193);
  });

  it('returns one section or 404', () => {
    const found = handleGetSection('w8x10');
    expect(found.status).toBe(200);
    expect(found.body).toMatchObject({ success: true, section: { designation: 'W8X10', A: 19.1 } });

    const missing = handleGetSection('W1X1');
    expect(missing).toEqual({
      status: 404,
      body: { success: false, error: "Section 'W1X1' not found.", code: 'SECTION_NOT_FOUND' },
    });
    expect(ConsoleService.getEntries()[0]).toMatchObject({ type: 'error', source: 'api' });
  });

  it('checks a member', () => {
    const r = handleCheck(JSON.stringify({ designation: 'W8X10', loads }));
    expect(r.status).toBe(200);
    if (!r.body.success) throw new Error(r.body.error);
    expect(r.body.result.summary.governingCheck).toBe('tension');
    expect(r.body.result.tension?.Pt).toBeCloseTo(60422.85, 6);
  });

  it('applies a named grade', () => {
    const r = handleCheck(JSON.stringify({ designation: 'W8X10', loads, grade: 'A36' }));
    if (!r.body.success) throw new Error(r.body.error);
    expect(r.body.result.tension?.PtYielding).toBeCloseTo(0.9 * 2531 * 19.1, 6);
  });

  it('rejects malformed requests with 400', () => {
    expect(handleCheck('{not json').body).toEqual({ success: false, error: 'Invalid JSON body' });
    expect(handleCheck('[]').status).toBe(400);
    expect(handleCheck(JSON.stringify({ loads })).body).toEqual({
      success: false,
      error: 'Missing or invalid "designation" string.',
    });
    expect(handleCheck(JSON.stringify({ designation: 'W8X10', loads, grade: 'S355' }))).toEqual({
      status: 400,
      body: { success: false, error: "Unknown steel grade 'S355'." },
    });
  });

  it('maps an unknown designation to 404', () => {
    const r = handleCheck(JSON.stringify({ designation: 'W1X1', loads }));
    expect(r.status).toBe(404);
    expect(r.body).toMatchObject({ success: false, code: 'SECTION_NOT_FOUND' });
  });
});

describe('parseLoads', () => {
  it('names every missing field', () => {
    expect(parseLoads({ Pu: 1, Mux: 'x' })).toBe('"loads" needs finite numbers for: Mux, Muy, L, Lx, Ly, Lt');
  });

  it('accepts an optional positive Cb', () => {
    expect(parseLoads({ ...loads, Cb: 1.3 })).toEqual({ ...loads, Cb: 1.3 });
    expect(parseLoads({ ...loads, Cb: 0 })).toBe('"loads.Cb" must be a positive number.');
    expect(parseLoads(loads)).toEqual(loads);
  });

  it('rejects a non-object', () => {
    expect(parseLoads(null)).toBe('Missing or invalid "loads" object.');
  });
});
