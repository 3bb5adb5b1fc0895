export { default as errorHandler, validationFailed } from './error-handler.js';
export type { ErrorBody } from './error-handler.js';
export { default as webhookRoutes } from './webhook-routes.js';
export type { WebhookRoutesOptions, IngestResponse } from './webhook-routes.js';
export { default as statsRoutes } from './stats-routes.js';
export type { StatsRoutesOptions } from './stats-routes.js';
export { default as healthRoutes } from './health-routes.js';
export type { HealthRoutesOptions, HealthResponse } from './health-routes.js';
export { requireWebhookSecret, secretsMatch, WEBHOOK_SECRET_HEADER } from './auth.js';
export { rateLimit } from './rate-limit.js';
