/**
 * Bootstrap
 *
 * Wires the platform engine with the domain layer.
 * This is the SINGLE place where platform meets domain.
 *
 * Sequence:
 *   1. Initialize observability, load config
 *   2. Pick the audit sink (Postgres when DATABASE_URL is set)
 *   3. Initialize the auth provider
 *   4. Register built-in templates, then any from TEMPLATES_DIR
 *   5. Register event subscribers
 *   6. Create the workflow engine
 */

import {
  loadConfig,
  initObservability,
  initDatabase,
  ensureAuditTable,
  PostgresAuditSink,
  InMemoryAuditSink,
  initAuthProvider,
  registerTemplates,
  loadTemplatesFromDirectory,
  subscribeAll,
  initWorkflowEngine,
  InMemoryContentStore,
  EventBusNotifier,
  type AppConfig,
  type ObservabilityProvider,
  type WorkflowEngine,
} from "@curriflow/platform";
import type { AuditSink, AuthProvider, ContentStore } from "@curriflow/contracts";
import { builtInTemplates, eventSubscribers } from "@curriflow/domain";

export interface BootstrapOptions {
  /** Environment to read config from (default process.env) */
  env?: Record<string, string | undefined>;
  authProvider?: AuthProvider;
  observability?: ObservabilityProvider;
  /** The content management system; defaults to an in-memory stand-in */
  contentStore?: ContentStore;
}

export interface BootstrapResult {
  config: AppConfig;
  engine: WorkflowEngine;
}

async function createAuditSink(config: AppConfig): Promise<AuditSink> {
  if (!config.database.url) {
    console.log("[bootstrap] DATABASE_URL not set, keeping audit entries in memory");
    return new InMemoryAuditSink();
  }
  initDatabase(config.database.url);
  await ensureAuditTable();
  return new PostgresAuditSink();
}

/**
 * Initializes the entire application.
 * Call once at server startup.
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<BootstrapResult> {
  // 0. Observability first, so failures in later steps are captured
  initObservability(options.observability);

  const config = loadConfig(options.env);

  const auditSink = await createAuditSink(config);

  initAuthProvider(options.authProvider);

  registerTemplates(builtInTemplates);
  if (config.templates.dir) {
    const extra = await loadTemplatesFromDirectory(config.templates.dir);
    console.log(`[bootstrap] Loaded ${extra.length} templates from ${config.templates.dir}`);
  }
  console.log(
    `[bootstrap] Registered ${builtInTemplates.length} built-in templates: ${builtInTemplates.map((t) => t.id).join(", ")}`
  );

  subscribeAll(eventSubscribers);
  console.log(`[bootstrap] Registered ${eventSubscribers.length} event subscribers`);

  const engine = initWorkflowEngine({
    contentStore: options.contentStore ?? new InMemoryContentStore(),
    notifier: new EventBusNotifier(),
    auditSink,
    collaboratorTimeoutMs: config.engine.collaboratorTimeoutMs,
    bulkMaxConcurrency: config.engine.bulkMaxConcurrency,
    auditBacklogLimit: config.audit.backlogLimit,
  });

  return { config, engine };
}
