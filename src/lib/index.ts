export * from './auth.js';
export * from './config.js';
export * from './http.js';
export * from './schemas.js';
export * from './csv.js';
export * from './provision.js';
export * from './resources/organizations.js';
export * from './resources/tenants.js';
export * from './resources/subscriptions.js';
export * from './resources/products.js';
export * from './resources/billing.js';
export * from './resources/users.js';
export type * from '../types/api.js';
export type * from '../types/tokens.js';
