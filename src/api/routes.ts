// API route handlers for the member check service.
// Handlers are plain functions returning { status, body }; vite-api-plugin.ts
// adapts them to the dev server middleware.

import { ConsoleService } from '../core/console/ConsoleService';
import { findSteelGrade, type ISteelGrade } from '../core/standards/AISC360';
import { isDesignCheckError } from '../core/standards/errors';
import { checkMember } from '../core/standards/MemberCheck';
import type { ILoadConditions, IMemberCheckResult, ISectionProperties } from '../core/standards/types';
import { WSectionLibrary } from '../core/section/WSectionLibrary';

export const API_VERSION = '1.0.0';

export interface ApiResponse<T = unknown> {
  status: number;
  body: T;
}

export interface ApiErrorBody {
  success: false;
  error: string;
  code?: string;
}

export interface ApiHealthResponse {
  status: string;
  version: string;
}

export interface ApiEndpoint {
  path: string;
  method: 'GET' | 'POST';
  description: string;
}

export interface ApiInfoResponse {
  name: string;
  version: string;
  endpoints: ApiEndpoint[];
}

export interface ApiSectionListResponse {
  success: true;
  count: number;
  sections: string[];
}

export interface ApiSectionResponse {
  success: true;
  section: ISectionProperties;
}

export interface ApiCheckRequest {
  designation: string;
  loads: ILoadConditions;
  grade?: string;
}

export interface ApiCheckResponse {
  success: true;
  result: IMemberCheckResult;
}

const REQUIRED_LOAD_FIELDS = ['Pu', 'Mux', 'Muy', 'L', 'Lx', 'Ly', 'Lt'] as const;

function fail(status: number, error: string, code?: string): ApiResponse<ApiErrorBody> {
  ConsoleService.log(`${status} ${error}`, 'error', 'api');
  return { status, body: code ? { success: false, error, code } : { success: false, error } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const v = record[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

/** Validate a loads object; returns the loads or an error message */
export function parseLoads(value: unknown): ILoadConditions | string {
  if (!isRecord(value)) return 'Missing or invalid "loads" object.';
  const missing = REQUIRED_LOAD_FIELDS.filter(k => readNumber(value, k) === undefined);
  if (missing.length > 0) {
    return `"loads" needs finite numbers for: ${missing.join(', ')}`;
  }
  const [Pu, Mux, Muy, L, Lx, Ly, Lt] = REQUIRED_LOAD_FIELDS.map(k => readNumber(value, k) ?? 0);
  if (value.Cb === undefined) return { Pu, Mux, Muy, L, Lx, Ly, Lt };
  const Cb = readNumber(value, 'Cb');
  if (Cb === undefined || Cb <= 0) return '"loads.Cb" must be a positive number.';
  return { Pu, Mux, Muy, L, Lx, Ly, Lt, Cb };
}

export function handleHealth(): ApiResponse<ApiHealthResponse> {
  return { status: 200, body: { status: 'ok', version: API_VERSION } };
}

export function handleInfo(): ApiResponse<ApiInfoResponse> {
  return {
    status: 200,
    body: {
      name: 'W-Section Member Check',
      version: API_VERSION,
      endpoints: [
        { path: '/api/health', method: 'GET', description: 'Health check' },
        { path: '/api/info', method: 'GET', description: 'API info' },
        { path: '/api/sections', method: 'GET', description: 'List W-section designations (?series=W8 filters by prefix)' },
        { path: '/api/sections/<designation>', method: 'GET', description: 'Properties of one W section' },
        { path: '/api/check', method: 'POST', description: 'Check a catalogue section against AISC 360 (LRFD)' },
      ],
    },
  };
}

export function handleListSections(series?: string | null): ApiResponse<ApiSectionListResponse> {
  const sections = WSectionLibrary.listSections(series ?? undefined);
  return { status: 200, body: { success: true, count: sections.length, sections } };
}

export function handleGetSection(designation: string): ApiResponse<ApiSectionResponse | ApiErrorBody> {
  const section = WSectionLibrary.findSection(designation);
  if (!section) return fail(404, `Section '${designation}' not found.`, 'SECTION_NOT_FOUND');
  return { status: 200, body: { success: true, section } };
}

/** POST /api/check with an already-read request body */
export function handleCheck(rawBody: string): ApiResponse<ApiCheckResponse | ApiErrorBody> {
  let data: unknown;
  try {
    data = JSON.parse(rawBody);
  } catch {
    return fail(400, 'Invalid JSON body');
  }
  if (!isRecord(data)) return fail(400, 'Request body must be a JSON object.');

  const designation = data.designation;
  if (typeof designation !== 'string' || designation.trim() === '') {
    return fail(400, 'Missing or invalid "designation" string.');
  }

  const loads = parseLoads(data.loads);
  if (typeof loads === 'string') return fail(400, loads);

  const gradeName = data.grade;
  let grade: ISteelGrade | undefined;
  if (gradeName !== undefined) {
    if (typeof gradeName !== 'string') return fail(400, '"grade" must be a string.');
    grade = findSteelGrade(gradeName);
    if (!grade) return fail(400, `Unknown steel grade '${gradeName}'.`);
  }

  try {
    const section = WSectionLibrary.getSection(designation, grade);
    const result = checkMember(section, loads);
    return { status: 200, body: { success: true, result } };
  } catch (err) {
    if (isDesignCheckError(err)) {
      ConsoleService.logError(err, 'api');
      const status = err.code === 'SECTION_NOT_FOUND' ? 404 : 422;
      return { status, body: { success: false, error: err.message, code: err.code } };
    }
    throw err;
  }
}
