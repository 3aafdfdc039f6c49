/**
 * @curriflow/platform
 *
 * The workflow engine and everything around it: template registry and
 * validation, permission evaluation, the instance store, audit sinks,
 * collaborators, and the REST adapter.
 */

// Config
export { loadConfig, type AppConfig } from "./core/config/index.js";

// Logging and observability
export { createLogger, logOperation } from "./core/logging/index.js";
export {
  initObservability,
  captureException,
  captureMessage,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  type ObservabilityProvider,
  type ObservabilityContext,
  type ObservabilitySeverity,
} from "./core/observability/index.js";

// Database
export { initDatabase, getDatabase, closeDatabase, isDatabaseInitialized } from "./core/database/connection.js";

// Event Bus
export { subscribe, subscribeAll, publish, clearSubscribers } from "./core/event-bus/index.js";

// Templates
export {
  validateTemplate,
  ENFORCED_CONDITIONS,
  type ValidationResult,
  type ValidationIssue,
  type ValidationWarning,
  type ValidationRule,
  type WarningRule,
} from "./core/templates/validator.js";
export {
  registerTemplate,
  registerTemplates,
  getTemplate,
  getAllTemplates,
  listTemplates,
  summarizeTemplate,
  loadTemplatesFromDirectory,
  clearTemplateRegistry,
  type TemplateGraph,
  type TemplateFilters,
} from "./core/templates/registry.js";

// Permissions
export {
  availableActions,
  transitionsFrom,
  canExecuteTransition,
  executableTransitions,
  hasAdministrativeOverride,
  templateRoles,
} from "./core/permissions/evaluator.js";

// Instances
export { InMemoryInstanceStore } from "./core/instances/store.js";
export { KeyedMutex } from "./core/instances/keyed-mutex.js";

// Audit
export {
  AuditRecorder,
  InMemoryAuditSink,
  PostgresAuditSink,
  ensureAuditTable,
  summarizeEntries,
  DEFAULT_AUDIT_PAGE_SIZE,
  type AuditRecorderOptions,
  type RetryResult,
} from "./core/audit/index.js";

// Collaborators
export { InMemoryContentStore } from "./core/content/index.js";
export { EventBusNotifier, NOTIFICATION_REQUESTED } from "./core/notifications/index.js";

// Engine
export {
  initWorkflowEngine,
  getWorkflowEngine,
  isWorkflowEngineInitialized,
  setWorkflowEngine,
  resetWorkflowEngine,
  WorkflowEngine,
  WorkflowError,
  StructuralValidationError,
  NotFoundError,
  ConflictError,
  RoleAssignmentError,
  PermissionDeniedError,
  InvalidTransitionError,
  ConditionNotMetError,
  CollaboratorError,
  OperationCancelledError,
  type EngineErrorType,
  type EngineResult,
  type EngineFailure,
  type WorkflowEngineOptions,
  type OperationOptions,
  type ApplyTemplateRequest,
  type ApplyTemplateResult,
  type ExecuteTransitionRequest,
  type ExecuteTransitionResult,
  type RemoveTemplateRequest,
  type RemoveTemplateResult,
  type ContentWorkflowState,
  type BulkApplyItem,
  type BulkApplyRequest,
  type BulkApplyOptions,
  type BulkApplyResult,
  type BulkApplyItemResult,
} from "./core/engine/index.js";

// Authentication
export { initAuthProvider, getAuthProvider, setAuthProvider, resetAuthProvider, DevAuthProvider, DEV_CALLER } from "./auth/index.js";

// REST adapter
export { registerWorkflowRoutes } from "./adapters/rest/adapter.js";
export { authMiddleware } from "./adapters/rest/auth-middleware.js";
