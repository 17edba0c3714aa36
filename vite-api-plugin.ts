import type { Plugin } from 'vite';
import type { IncomingMessage, ServerResponse } from 'node:http';
import {
  type ApiResponse,
  handleCheck,
  handleGetSection,
  handleHealth,
  handleInfo,
  handleListSections,
} from './src/api/routes';
import { ConsoleService } from './src/core/console/ConsoleService';

/**
 * Vite plugin that adds local API middleware endpoints for the member check.
 * These endpoints are available during development via the Vite dev server.
 *
 * Endpoints:
 *   GET  /api/health               - Health check
 *   GET  /api/info                 - API description
 *   GET  /api/sections?series=W8   - List section designations
 *   GET  /api/sections/<name>      - Properties of one section
 *   POST /api/check                - Run the AISC 360 member check
 */

function send(res: ServerResponse, response: ApiResponse): void {
  res.statusCode = response.status;
  res.end(JSON.stringify(response.body));
}

function setCommonHeaders(res: ServerResponse, methods: string): void {
  res.setHeader('Content-Type', 'application/json');
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', methods);
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
}

/** Answers preflight and wrong-method requests; true when the request was handled */
function rejectMethod(req: IncomingMessage, res: ServerResponse, allowed: string): boolean {
  if (req.method === 'OPTIONS') {
    res.statusCode = 204;
    res.end();
    return true;
  }
  if (req.method !== allowed) {
    res.statusCode = 405;
    res.end(JSON.stringify({ success: false, error: `Method not allowed. Use ${allowed}.` }));
    return true;
  }
  return false;
}

export function apiPlugin(): Plugin {
  return {
    name: 'member-check-api',
    configureServer(server) {
      // ── Health check ────────────────────────────────────────────────────
      server.middlewares.use('/api/health', (req, res) => {
        setCommonHeaders(res, 'GET, OPTIONS');
        if (rejectMethod(req, res, 'GET')) return;
        send(res, handleHealth());
      });

      // ── API info ────────────────────────────────────────────────────────
      server.middlewares.use('/api/info', (req, res) => {
        setCommonHeaders(res, 'GET, OPTIONS');
        if (rejectMethod(req, res, 'GET')) return;
        send(res, handleInfo());
      });

      // ── Section catalogue ───────────────────────────────────────────────
      // Mounted on a prefix, so req.url is '/', '/?series=W8' or '/W8X10'
      server.middlewares.use('/api/sections', (req, res) => {
        setCommonHeaders(res, 'GET, OPTIONS');
        if (rejectMethod(req, res, 'GET')) return;

        const url = new URL(req.url ?? '/', 'http://localhost');
        const name = decodeURIComponent(url.pathname.replace(/^\/+|\/+$/g, ''));
        send(res, name ? handleGetSection(name) : handleListSections(url.searchParams.get('series')));
      });

      // ── Member check ────────────────────────────────────────────────────
      server.middlewares.use('/api/check', (req, res) => {
        setCommonHeaders(res, 'POST, OPTIONS');
        if (rejectMethod(req, res, 'POST')) return;

        let body = '';
        req.on('data', (chunk: Buffer) => {
          body += chunk.toString();
        });
        req.on('end', () => {
          try {
            send(res, handleCheck(body));
          } catch (err) {
            ConsoleService.logError(err, 'api');
            send(res, { status: 500, body: { success: false, error: 'Internal error while checking the member' } });
          }
        });
      });
    },
  };
}
