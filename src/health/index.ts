export { HealthCheckService, calculateOverallStatus } from './services/health-check.service.js';
export { probeDependency, DEFAULT_PROBE_OPTIONS } from './services/dependency-probe.service.js';
export type {
  DependencyCheck,
  DependencyClient,
  DependencyDetail,
  HealthReport,
  OverallStatus,
  ProbeOptions,
  ServiceStatus
} from './types/health.types.js';
