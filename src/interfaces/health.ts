export type HealthStatus = 'pass' | 'fail';

export type HealthCheckName =
  | 'folders'
  | 'rotation-counts'
  | 'backup-age'
  | 'backup-size'
  | 'storage-session';

export interface HealthCheck {
  name: HealthCheckName;
  status: HealthStatus;
  reason: string;
}

export interface HealthReport {
  checkedAt: string;
  passed: boolean;
  checks: HealthCheck[];
}
