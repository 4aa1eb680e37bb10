import { DATABASE_DEPENDENCY_NAME } from '../dependencies/postgres.dependency.js';
import type { HealthReport } from '../health/types/health.types.js';
import type { MetricsSnapshot } from '../metrics/types/metrics.types.js';
import type { HostInfo } from '../system/host-info.js';
import { escapeHtml, formatTimestamp, toMegabytes } from './html.helpers.js';
import { renderHumanReport } from './report.renderer.js';

/**
 * Everything the dashboard page shows
 */
export interface DashboardView {
  report: HealthReport;
  metrics: MetricsSnapshot;
  host: HostInfo;
  environment: string;
  version: string;
  databaseHost: string;
  databaseName: string;
  cacheHost: string;
  responseTimeMs: number;
}

const STYLES = `
  body {
    font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif;
    margin: 0;
    background: linear-gradient(135deg, #667eea 0%, #764ba2 100%);
    min-height: 100vh;
    color: white;
  }
  .container { max-width: 1200px; margin: 0 auto; padding: 20px; }
  .header { text-align: center; padding: 40px 0; }
  .services {
    display: grid;
    grid-template-columns: repeat(auto-fit, minmax(300px, 1fr));
    gap: 20px;
    margin: 30px 0;
  }
  .service-card {
    background: rgba(255,255,255,0.1);
    padding: 20px;
    border-radius: 15px;
    border: 1px solid rgba(255,255,255,0.2);
  }
  .status-badge {
    display: inline-block;
    padding: 5px 10px;
    border-radius: 20px;
    font-size: 12px;
    font-weight: bold;
  }
  .status-healthy { background: #4caf50; }
  .status-error { background: #f44336; }
  .status-degraded { color: #ffcc80; }
  .metrics {
    display: grid;
    grid-template-columns: repeat(auto-fit, minmax(200px, 1fr));
    gap: 15px;
    margin: 20px 0;
  }
  .metric { background: rgba(255,255,255,0.2); padding: 15px; border-radius: 10px; text-align: center; }
  .metric-value { font-size: 24px; font-weight: bold; color: #ffd700; }
  .logs {
    background: rgba(0,0,0,0.3);
    padding: 15px;
    border-radius: 10px;
    font-family: 'Courier New', monospace;
    font-size: 12px;
    white-space: pre-wrap;
  }
  dl.detail { display: grid; grid-template-columns: max-content 1fr; gap: 4px 12px; }
  dl.detail dt { font-weight: bold; }
  dl.detail dd { margin: 0; word-break: break-word; }
  button {
    background: #2196f3;
    color: white;
    border: none;
    padding: 10px 20px;
    border-radius: 5px;
    cursor: pointer;
    margin: 5px;
  }
  button:hover { background: #1976d2; }
  .refresh { text-align: center; margin: 20px 0; }
`;

// No onclick attributes: helmet's CSP sends script-src-attr 'none'
const SCRIPT = `
  function showResult(url) {
    fetch(url)
      .then(function (response) { return response.json(); })
      .then(function (data) {
        document.getElementById('test-output').textContent = JSON.stringify(data, null, 2);
      });
  }
  document.getElementById('test-db').addEventListener('click', function () { showResult('/api/test-db'); });
  document.getElementById('test-cache').addEventListener('click', function () { showResult('/api/test-cache'); });
  document.getElementById('refresh').addEventListener('click', function () { location.reload(); });
  setInterval(function () { location.reload(); }, 30000);
`;

function metricTile(value: string | number, label: string): string {
  return `<div class="metric"><div class="metric-value">${escapeHtml(value)}</div><div>${escapeHtml(label)}</div></div>`;
}

function systemInformation(view: DashboardView): string {
  const lines = [
    'Configuration:',
    `DB_HOST: ${view.databaseHost}`,
    `DB_NAME: ${view.databaseName}`,
    `REDIS_HOST: ${view.cacheHost}`,
    `ENVIRONMENT: ${view.environment}`,
    '',
    'Container Information:',
    `Hostname: ${view.host.hostname}`,
    `Node.js Version: ${view.host.nodeVersion}`,
    `Platform: ${view.host.platform}/${view.host.arch}`,
    `PID: ${view.host.pid}`,
    '',
    'Service Status:',
    ...view.report.checks.map((check) => `${check.name}: ${check.reachable ? 'CONNECTED' : 'DISCONNECTED'}`)
  ];
  return escapeHtml(lines.join('\n'));
}

/**
 * Full HTML page served at /
 */
export function renderDashboardPage(view: DashboardView): string {
  const database = view.report.checks.find((check) => check.name === DATABASE_DEPENDENCY_NAME);
  const dbConnections = database?.detail.connections ?? 'unavailable';

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>Compose Status Demo</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="container">
    <div class="header">
      <h1>Multi-Container Status Demo</h1>
      <p>Express web application with PostgreSQL and Redis</p>
    </div>

    <div class="services">
      <div class="service-card">
        <h3>Web Application</h3>
        <div class="status-badge status-healthy">RUNNING</div>
        <p><strong>Container:</strong> ${escapeHtml(view.host.hostname)}</p>
        <p><strong>Environment:</strong> ${escapeHtml(view.environment)}</p>
        <p><strong>Version:</strong> ${escapeHtml(view.version)}</p>
        <p><strong>Uptime:</strong> ${view.host.uptimeSeconds} seconds</p>
      </div>
    </div>

    ${renderHumanReport(view.report)}

    <div class="metrics">
      ${metricTile(view.metrics.requestCount, 'Total Requests')}
      ${metricTile(dbConnections, 'DB Connections')}
      ${metricTile(view.metrics.cacheHitCount, 'Cache Hits')}
      ${metricTile(`${toMegabytes(view.metrics.memoryUsedBytes)} MB`, 'Memory Usage')}
      ${metricTile(view.metrics.cpuCount, 'CPU Count')}
      ${metricTile(`${view.responseTimeMs}ms`, 'Response Time')}
    </div>

    <div class="service-card">
      <h3>System Information</h3>
      <div class="logs">${systemInformation(view)}</div>
    </div>

    <div class="refresh">
      <button id="test-db">Test Database</button>
      <button id="test-cache">Test Cache</button>
      <button id="refresh">Refresh Data</button>
      <pre id="test-output" class="logs"></pre>
      <p><small>Last updated: ${formatTimestamp(view.metrics.capturedAt)}</small></p>
    </div>
  </div>
  <script>${SCRIPT}</script>
</body>
</html>`;
}
