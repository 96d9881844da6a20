export { createAnalytics, NoopAnalytics, type Analytics } from './analytics.js';
export { SqliteAnalytics, classifyWebhookError } from './analytics-store.js';
export { ApiKeyTable, AuthGate, extractCredential, type AuthContext } from './auth.js';
export type { Backend, ExecutionContext } from './backend.js';
export { findConfigFile, loadConfig, parseConfig, type AppConfig } from './config.js';
export { ContainerBackend, buildContainerArgv } from './container-backend.js';
export { Dispatcher, selectBackend } from './dispatcher.js';
export * from './errors.js';
export { createHttpHandler, startHttpServer, type HttpServerDeps } from './http-server.js';
export { LocalBackend } from './local-backend.js';
export { PermissionSet, WILDCARD } from './permissions.js';
export { CommandRegistry } from './registry.js';
export { createCommandServer } from './server.js';
export type * from './types.js';
export { WebhookBackend } from './webhook-backend.js';
