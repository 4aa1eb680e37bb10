export {
  renderReport,
  renderHumanReport,
  toMachineDocument,
  type ReportFormat,
  type MachineHealthDocument,
  type MachineCheckEntry
} from './report.renderer.js';
export { renderDashboardPage, type DashboardView } from './dashboard.page.js';
export { escapeHtml, formatTimestamp, toMegabytes } from './html.helpers.js';
