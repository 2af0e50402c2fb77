/**
 * orchestrator/index.ts
 * Barrel export for the route scan orchestrator.
 */

export { RouteScanOrchestrator } from './route-scan-orchestrator.js';
export type { RouteScanOrchestratorOptions } from './route-scan-orchestrator.js';
