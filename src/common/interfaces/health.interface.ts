export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  uptime: number;
  service: string;
}
