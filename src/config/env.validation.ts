import Joi from 'joi';

export const envValidationSchema = Joi.object({
  PORT: Joi.number().port().default(3000),
  LOG_LEVEL: Joi.string().valid('fatal', 'error', 'warn', 'info', 'debug', 'trace').default('info'),
  // Flag, hop count or comma-separated proxy addresses; see resolveTrustProxy.
  TRUST_PROXY: Joi.string().trim().allow('').default('false'),
  REDIS_URL: Joi.string().uri().default('redis://localhost:6379'),
  STORE_KEY_PREFIX: Joi.string().default('gatehouse'),
  // HS256 signing secret; the process must not start without a strong one.
  JWT_SECRET: Joi.string().min(32).required(),
  JWT_ISSUER: Joi.string().default('gatehouse'),
  ACCESS_TOKEN_TTL_SECONDS: Joi.number().integer().min(30).default(900),
  REFRESH_TOKEN_TTL_SECONDS: Joi.number().integer().min(60).default(1209600),
  BCRYPT_ROUNDS: Joi.number().integer().min(4).max(15).default(12),
  RATE_LIMIT_STORE: Joi.string().valid('memory', 'redis').default('memory'),
  RATE_LIMIT_MAX_REQUESTS: Joi.number().integer().positive().default(120),
  RATE_LIMIT_WINDOW_SECONDS: Joi.number().integer().positive().default(60),
  // Tighter budget for register/login/refresh.
  AUTH_RATE_LIMIT_MAX_REQUESTS: Joi.number().integer().positive().default(10),
  AUTH_RATE_LIMIT_WINDOW_SECONDS: Joi.number().integer().positive().default(60),
  // Empty string disables the password-protected demo route (nothing matches).
  DEMO_ROUTE_PASSWORD: Joi.string().allow('').default(''),
  BOOTSTRAP_ADMIN_EMAIL: Joi.string().email().allow('').default(''),
  // Checked for length by AdminBootstrapService when an email is configured.
  BOOTSTRAP_ADMIN_PASSWORD: Joi.string().allow('').default(''),
});
