export interface HealthResponse {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;
  service: string;
  trades?: number;          // records in the journal file, absent when unreadable
}
