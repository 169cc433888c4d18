export interface ClientConfig {
  pollIntervalMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
}
