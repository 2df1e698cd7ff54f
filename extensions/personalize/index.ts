/**
 * Personalize Orchestrator - Package Entry Point
 *
 * Re-exports the workflow components and the environment wiring that builds
 * them for a Lambda handler or a script.
 */

export * from "./src/index.js";
export {
  Orchestrator,
  createOrchestrator,
  type OrchestratorClients,
  type OrchestratorOptions,
} from "./src/orchestrator.js";
