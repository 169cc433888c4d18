import * as Joi from 'joi';

export const configValidationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().port().default(1422),
  CORS_ORIGIN: Joi.string().default('*'),

  LOG_HTTP_REQUESTS: Joi.boolean().default(true),
  LOG_FORMAT: Joi.string().valid('json', 'text').default('json'),
  LOG_SKIP_POLL_REQUESTS: Joi.boolean().default(true),

  SESSION_COOKIE_NAME: Joi.string()
    .pattern(/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/)
    .default('live__sid'),
  SESSION_COOKIE_SECURE: Joi.boolean().default(false),

  LIVE_PING_INTERVAL_MS: Joi.number().integer().min(0).default(30000),
  LIVE_MAX_FRAME_BYTES: Joi.number().integer().min(125).default(1048576),
  LIVE_QUEUE_IDLE_TTL_MS: Joi.number().integer().min(0).default(0),
  LIVE_QUEUE_SWEEP_INTERVAL_MS: Joi.number().integer().min(100).default(60000),
  LIVE_CLIENT_POLL_INTERVAL_MS: Joi.number().integer().min(100).default(1500),
  LIVE_CLIENT_RECONNECT_BASE_MS: Joi.number().integer().min(100).default(1200),
  LIVE_CLIENT_RECONNECT_MAX_MS: Joi.number().integer().min(100).default(10000),

  AUTORELOAD_ENABLED: Joi.boolean().default(false),
  AUTORELOAD_WATCH_DIRS: Joi.string().default('.'),
  AUTORELOAD_INTERVAL_MS: Joi.number().integer().min(100).default(1000),
});
