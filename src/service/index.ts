export { Service } from './service.js';
export type { ServiceOptions, ServiceState, ServiceStatus } from './service.js';
export { createService } from './create-service.js';
export type { CreateServiceOptions, ServiceSpec } from './create-service.js';
export { policyFor, runChecks } from './policies.js';
export type { MethodPolicy, RequestCheck } from './policies.js';
