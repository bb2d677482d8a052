export { MonitorService } from './MonitorService.js';
export type { MonitorServiceDeps } from './MonitorService.js';
export type {
  MonitorEventTypes,
  MonitorStatus,
  MonitorCounters,
  ShutdownReport,
  SuppressReason,
} from './types.js';
