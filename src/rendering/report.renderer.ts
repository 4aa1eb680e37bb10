import type {
  DependencyCheck,
  HealthReport,
  OverallStatus,
  ServiceStatus
} from '../health/types/health.types.js';
import { escapeHtml } from './html.helpers.js';

/**
 * Audience a report is rendered for
 * - machine: JSON document for orchestrator probes and scripts
 * - human: HTML fragment for the dashboard
 */
export type ReportFormat = 'machine' | 'human';

/**
 * Per-dependency entry of the machine document
 */
export interface MachineCheckEntry {
  name: string;
  reachable: boolean;
  latency_ms: number;
  detail?: Record<string, string>;
  error?: string;
}

/**
 * Machine-readable health document
 * Field names are part of the public contract of /health and /api/stats
 */
export interface MachineHealthDocument {
  status: OverallStatus;
  timestamp: string;
  services: Record<string, ServiceStatus>;
  checks: MachineCheckEntry[];
}

const UNAVAILABLE = 'unavailable';

function toServiceStatus(check: DependencyCheck): ServiceStatus {
  return check.reachable ? 'healthy' : 'unhealthy';
}

function toMachineEntry(check: DependencyCheck): MachineCheckEntry {
  const detailEntries = Object.entries(check.detail);

  return {
    name: check.name,
    reachable: check.reachable,
    latency_ms: check.latencyMs,
    ...(detailEntries.length > 0 && { detail: Object.fromEntries(detailEntries) }),
    ...(check.error !== undefined && { error: check.error })
  };
}

/**
 * Build the machine document for a report
 * Pure: depends on nothing but the report itself
 */
export function toMachineDocument(report: HealthReport): MachineHealthDocument {
  const services: Record<string, ServiceStatus> = {};
  for (const check of report.checks) {
    services[check.name] = toServiceStatus(check);
  }

  return {
    status: report.overallStatus,
    timestamp: report.generatedAt.toISOString(),
    services,
    checks: report.checks.map(toMachineEntry)
  };
}

function renderDetailList(check: DependencyCheck): string {
  const entries = Object.entries(check.detail);

  if (entries.length === 0) {
    return `<p class="detail-unavailable"><strong>Details:</strong> ${UNAVAILABLE}</p>`;
  }

  const rows = entries
    .map(([key, value]) => `<dt>${escapeHtml(key)}</dt><dd>${escapeHtml(value)}</dd>`)
    .join('');
  return `<dl class="detail">${rows}</dl>`;
}

function renderCheckCard(check: DependencyCheck): string {
  const badgeClass = check.reachable ? 'status-healthy' : 'status-error';
  const badgeText = check.reachable ? 'CONNECTED' : 'DISCONNECTED';

  return [
    `<div class="service-card" data-dependency="${escapeHtml(check.name)}">`,
    `<h3>${escapeHtml(check.name)}</h3>`,
    `<div class="status-badge ${badgeClass}">${badgeText}</div>`,
    `<p><strong>Status:</strong> ${toServiceStatus(check)}</p>`,
    `<p><strong>Probe time:</strong> ${check.latencyMs}ms</p>`,
    renderDetailList(check),
    check.error !== undefined ? `<p class="error"><strong>Error:</strong> ${escapeHtml(check.error)}</p>` : '',
    '</div>'
  ].join('\n');
}

/**
 * HTML fragment carrying every fact of the machine document
 */
export function renderHumanReport(report: HealthReport): string {
  const overall = report.overallStatus.toUpperCase();
  const cards = report.checks.map(renderCheckCard).join('\n');

  return [
    '<section class="dependencies">',
    `<p class="overall-status status-${report.overallStatus}"><strong>Overall status:</strong> ${overall}</p>`,
    `<p class="generated-at"><strong>Checked at:</strong> ${report.generatedAt.toISOString()}</p>`,
    `<div class="services">${cards}</div>`,
    '</section>'
  ].join('\n');
}

/**
 * Render a report for the given audience
 */
export function renderReport(report: HealthReport, format: ReportFormat): string {
  switch (format) {
    case 'machine':
      return JSON.stringify(toMachineDocument(report));
    case 'human':
      return renderHumanReport(report);
  }
}
