import type pino from 'pino';
import { getEnvironment } from '../../config/environment';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import { INSTANCE_PROBE_TIMEOUT_MS, isSuccess, sendRequest } from './searxngClient';

export type CheckStatus = 'ok' | 'warn' | 'fail';

export interface DiagnosticCheck {
  name: 'Basic connection' | 'GET search' | 'JSON format' | 'POST search';
  status: CheckStatus;
  detail: string;
  hints: string[];
}

export interface DiagnosticsReport {
  url: string;
  checkedAt: Date;
  checks: DiagnosticCheck[];
}

const STATUS_ICONS: Record<CheckStatus, string> = {
  ok: '✅',
  warn: '⚠️',
  fail: '❌',
};

const TROUBLESHOOTING_TIPS = [
  '**Docker users**: Ensure both containers are running and networked correctly',
  '**Docker users**: The URL should be `http://searxng:8080` in Docker environment',
  '**Local setup**: The URL should be `http://localhost:8080` for local development',
  '**CORS issues**: SearXNG might block requests from different origins',
  '**Firewall issues**: Check for firewall rules blocking the connection',
];

function failure(error: unknown): string {
  return `Failed - ${error instanceof Error ? error.message : String(error)}`;
}

async function checkBaseConnection(url: string): Promise<DiagnosticCheck> {
  try {
    const reply = await sendRequest(`${url}/`, { method: 'GET', timeoutMs: INSTANCE_PROBE_TIMEOUT_MS });
    if (!isSuccess(reply.statusCode)) {
      throw new Error(`HTTP ${reply.statusCode}`);
    }
    return {
      name: 'Basic connection',
      status: 'ok',
      detail: 'Success - Server is reachable',
      hints: [`Status code: ${reply.statusCode}`, `Content type: ${reply.contentType ?? 'unknown'}`],
    };
  } catch (error) {
    return {
      name: 'Basic connection',
      status: 'fail',
      detail: failure(error),
      hints: ["Try accessing the SearXNG instance directly in your browser to verify it's running."],
    };
  }
}

async function checkGetSearch(url: string): Promise<DiagnosticCheck[]> {
  let bodyText: string;
  try {
    const reply = await sendRequest(`${url}/search?q=test&format=json`, {
      method: 'GET',
      timeoutMs: INSTANCE_PROBE_TIMEOUT_MS,
    });
    if (!isSuccess(reply.statusCode)) {
      throw new Error(`HTTP ${reply.statusCode}`);
    }
    bodyText = reply.bodyText;
  } catch (error) {
    // The JSON check only runs once GET search succeeds
    return [{ name: 'GET search', status: 'fail', detail: failure(error), hints: [] }];
  }

  const getCheck: DiagnosticCheck = { name: 'GET search', status: 'ok', detail: 'Success', hints: [] };

  let data: unknown;
  try {
    data = JSON.parse(bodyText);
  } catch {
    return [getCheck, { name: 'JSON format', status: 'fail', detail: 'Invalid JSON response', hints: [] }];
  }

  const jsonCheck: DiagnosticCheck =
    typeof data === 'object' && data !== null && 'results' in data
      ? { name: 'JSON format', status: 'ok', detail: 'Valid SearXNG response structure', hints: [] }
      : {
          name: 'JSON format',
          status: 'warn',
          detail: "Unexpected response structure (missing 'results' key)",
          hints: [],
        };

  return [getCheck, jsonCheck];
}

async function checkPostSearch(url: string): Promise<DiagnosticCheck> {
  try {
    const reply = await sendRequest(`${url}/search`, {
      method: 'POST',
      form: { q: 'test', format: 'json' },
      timeoutMs: INSTANCE_PROBE_TIMEOUT_MS,
    });
    if (!isSuccess(reply.statusCode)) {
      throw new Error(`HTTP ${reply.statusCode}`);
    }
    return { name: 'POST search', status: 'ok', detail: 'Success', hints: [] };
  } catch (error) {
    return { name: 'POST search', status: 'fail', detail: failure(error), hints: [] };
  }
}

/**
 * Probes an instance one check at a time. Never throws: every failure is
 * recorded on its check.
 */
export async function runDiagnostics(
  customUrl?: string,
  logger?: pino.Logger
): Promise<DiagnosticsReport> {
  const url = (customUrl?.trim() || getEnvironment().SEARXNG_URL).replace(/\/+$/, '');
  const log = logger ?? createChildLogger(generateCorrelationId());

  log.info({ url }, 'Testing connection to SearXNG instance');

  const checks: DiagnosticCheck[] = [];
  checks.push(await checkBaseConnection(url));
  checks.push(...(await checkGetSearch(url)));
  checks.push(await checkPostSearch(url));

  log.info(
    { url, checks: checks.map(check => `${check.name}:${check.status}`) },
    'SearXNG diagnostics finished'
  );

  return { url, checkedAt: new Date(), checks };
}

function formatCheckTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatDiagnosticsReport(report: DiagnosticsReport): string {
  const lines: string[] = [
    '# SearXNG Connection Diagnostics',
    '',
    `**Testing URL**: ${report.url}`,
    '',
    `**Current time**: ${formatCheckTime(report.checkedAt)}`,
    '',
    '## Test Results',
    '',
  ];

  for (const check of report.checks) {
    lines.push(`${STATUS_ICONS[check.status]} **${check.name}**: ${check.detail}`, '');
    if (check.hints.length > 0) {
      lines.push(...check.hints.map(hint => `   ${hint}`), '');
    }
  }

  lines.push('## Troubleshooting Tips', '');
  lines.push(...TROUBLESHOOTING_TIPS.map((tip, index) => `${index + 1}. ${tip}`));

  return `${lines.join('\n')}\n`;
}
