export const SESSION_DEFAULTS = {
  COOKIE_NAME: 'live__sid',
  COOKIE_SECURE: false,
  ID_PREFIX: 'sess-',
  ID_RANDOM_BYTES: 8,
} as const;

/** Cookie values accepted as an existing session id */
export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;
