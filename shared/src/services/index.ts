export { SessionEngine } from './sessionEngine';
export type { SessionEngineOptions } from './sessionEngine';

export { RoleSyncLoop } from './roleSyncLoop';
export type { RoleGranter, GrantOutcome, SweepSummary } from './roleSyncLoop';
