export type HealthStatus = "ok" | "error";

export interface HealthReport {
  status: HealthStatus;
  details?: string;
}

export interface ClientHandle<TClient> {
  client: TClient;
  healthCheck: () => Promise<HealthReport>;
  close: () => Promise<void>;
}
