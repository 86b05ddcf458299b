/** Body of `GET /health`. */
export interface HealthStatus {
  status: 'ok';
  /** Agent display name. */
  agent: string;
  /** Tasks currently retained by the agent's store. */
  tasks: number;
  uptime: number;
}
