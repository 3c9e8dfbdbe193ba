export {
  RetryOrchestrator,
  withRetry,
  type RetryOrchestratorOptions,
  type SessionOperation,
  type WatchdogFactory,
} from './retry-orchestrator.js';
