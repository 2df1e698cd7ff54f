/**
 * Notifications Module Index
 */

export {
  type Notifier,
  type NotificationResult,
  type ResourceStateChange,
  type Transition,
  NotificationError,
  classifyTransition,
  isCreate,
  resultArn,
} from "./notifier.js";
export { NotificationDispatcher, type DispatchReport, STATUS_ACTIVE, STATUS_CREATING } from "./dispatcher.js";
export { EventBridgeNotifier, EVENT_SOURCE, type EventBridgeNotifierConfig } from "./eventbridge.js";
export { SnsPublisher, type ProtocolMessages, type SnsPublisherConfig } from "./sns.js";
export {
  buildWorkflowOutcomeMessage,
  publishWorkflowOutcome,
  type WorkflowOutcomeEvent,
  type WorkflowOutcomeContext,
  type WorkflowOutcomeMessage,
  type StatesError,
} from "./workflow-outcome.js";
