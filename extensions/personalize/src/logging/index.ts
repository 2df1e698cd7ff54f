/**
 * Workflow Logging Module Index
 */

export {
  type WorkflowLogLevel,
  type WorkflowLogEntry,
  type LogFormatter,
  type LogTransport,
  type WorkflowLogger,
  type LogContext,
  type LoggingConfig,
  type FormatterOptions,
  WORKFLOW_LOG_LEVELS,
  compareLogLevels,
  shouldLog,
  isWorkflowLogLevel,
  createDefaultFormatter,
  ConsoleTransport,
  MemoryTransport,
  ROOT_SUBSYSTEM,
  createWorkflowLogger,
  getWorkflowLogger,
  setGlobalWorkflowLogger,
} from "./logger.js";
