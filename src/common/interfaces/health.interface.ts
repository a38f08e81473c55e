export interface DependencyHealth {
  healthy: boolean;
  latencyMs?: number;
  status?: string;
  error?: string;
}
