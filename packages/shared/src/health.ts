// Health types

export type ComponentStatus = 'healthy' | 'unhealthy';

export interface HealthStatus {
  apiStatus: ComponentStatus;
  modelStatus: ComponentStatus;
  provider: string;
  timestamp: number;
}
