/**
 * Fixed routes shared by the server and the browser reconciler
 */
export const LIVE_PATHS = {
  SOCKET: '/_live/ws',
  POLL: '/_live/patch',
  INVALID: '/_live/invalid',
  CLIENT_SCRIPT: '/_live/client.js',
} as const;

/**
 * Live delivery default configuration values
 */
export const LIVE_DEFAULTS = {
  /** Server ping cadence; a peer silent for two intervals is dropped */
  PING_INTERVAL_MS: 30000,
  /** Largest payload accepted in a single client frame */
  MAX_FRAME_BYTES: 1024 * 1024, // 1MB
  /** 0 keeps pending queues until drained */
  QUEUE_IDLE_TTL_MS: 0,
  QUEUE_SWEEP_INTERVAL_MS: 60000,
  CLIENT_POLL_INTERVAL_MS: 1500,
  CLIENT_RECONNECT_BASE_MS: 1200,
  CLIENT_RECONNECT_MAX_MS: 10000,
  CLIENT_MAX_RETRY_EXPONENT: 6,
} as const;

/**
 * Close frame status codes the server sends
 */
export const LIVE_CLOSE_CODES = {
  GOING_AWAY: 1001,
} as const;

export const LIVE_EVENTS = {
  CONNECTION_OPENED: 'live.connection.opened',
  CONNECTION_CLOSED: 'live.connection.closed',
  PATCH_QUEUED: 'live.patch.queued',
  PATCH_DELIVERED: 'live.patch.delivered',
  PATCH_DRAINED: 'live.patch.drained',
  TARGET_INVALIDATED: 'live.target.invalidated',
  RELOAD_BROADCAST: 'live.reload.broadcast',
  QUEUE_EVICTED: 'live.queue.evicted',
} as const;
