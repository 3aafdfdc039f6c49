/**
 * REST Adapter
 *
 * Maps the Workflow Engine to HTTP endpoints on a Fastify instance.
 *
 *   1. Public: GET /api/health, GET /api/auth/config
 *   2. Templates: GET /api/workflows/templates[/:templateId]
 *   3. Operations: apply, bulk-apply, transition, state, remove
 *   4. Audit: GET /api/workflows/audit[/summary]
 *
 * Bodies and query strings are validated with zod before they reach the
 * engine. Engine failures are mapped to HTTP statuses by errorType.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import {
  ROLES,
  TEMPLATE_CATEGORIES,
  type AuditSink,
  type Caller,
  type QueryableAuditSink,
} from "@curriflow/contracts";
import { getAuthProvider } from "../../auth/index.js";
import { authMiddleware } from "./auth-middleware.js";
import { getAllTemplates } from "../../core/templates/registry.js";
import {
  getWorkflowEngine,
  isWorkflowEngineInitialized,
  type EngineErrorType,
  type EngineResult,
} from "../../core/engine/index.js";
import { captureException } from "../../core/observability/index.js";

/**
 * Fallback caller for when auth middleware has not set one.
 * Holds no roles, so every role-gated route refuses it.
 */
const FALLBACK_CALLER: Caller = {
  userId: "anonymous",
  roles: [],
  type: "human",
};

function getCaller(request: FastifyRequest): Caller {
  return request.caller ?? FALLBACK_CALLER;
}

/**
 * Maps engine error types to HTTP status codes.
 * 499 marks an operation the client cancelled before it started.
 */
const ERROR_TYPE_TO_STATUS: Record<EngineErrorType, number> = {
  not_found: 404,
  validation: 400,
  permission: 403,
  conflict: 409,
  invalid_transition: 409,
  condition_not_met: 422,
  collaborator: 502,
  cancelled: 499,
  unknown: 500,
};

function sendResult<T>(reply: FastifyReply, result: EngineResult<T>, successStatus = 200) {
  reply.status(result.success ? successStatus : ERROR_TYPE_TO_STATUS[result.errorType]);
  return result;
}

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const nonEmpty = z.string().trim().min(1);

const roleAssignmentsSchema = z.record(z.enum(ROLES), z.array(nonEmpty));

const applyBodySchema = z.object({
  contentUid: nonEmpty,
  roleAssignments: roleAssignmentsSchema,
  force: z.boolean().optional(),
  backupExisting: z.boolean().optional(),
});

const bulkApplyBodySchema = z.object({
  items: z
    .array(
      z.object({
        contentUid: nonEmpty,
        roleAssignments: roleAssignmentsSchema,
        force: z.boolean().optional(),
        backupExisting: z.boolean().optional(),
      })
    )
    .min(1, "items must not be empty")
    .max(1000, "At most 1000 items per request"),
  maxConcurrent: z.number().int().min(1).max(50).optional(),
});

const transitionBodySchema = z.object({
  contentUid: nonEmpty,
  transitionId: nonEmpty,
  role: z.enum(ROLES),
  comments: z.string().max(5000).optional(),
});

const templatesQuerySchema = z.object({
  category: z.enum(TEMPLATE_CATEGORIES).optional(),
  complexity: z.string().optional(),
  search: z.string().max(200).optional(),
});

const stateQuerySchema = z.object({
  role: z.enum(ROLES),
});

const booleanFlag = z
  .enum(["true", "false"])
  .optional()
  .transform((value) => (value === undefined ? undefined : value === "true"));

const removeQuerySchema = z.object({
  restoreBackup: booleanFlag,
});

const auditRangeSchema = z.object({
  dateFrom: z.string().datetime().optional(),
  dateTo: z.string().datetime().optional(),
});

const auditQuerySchema = auditRangeSchema.extend({
  userId: z.string().optional(),
  contentUid: z.string().optional(),
  templateId: z.string().optional(),
  operation: z.enum(["apply_template", "execute_transition", "remove_template"]).optional(),
  success: booleanFlag,
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

/** 400 response carrying per-field errors, in the shape forms render */
function sendInvalid(reply: FastifyReply, message: string, error: z.ZodError) {
  return reply.status(400).send({
    success: false,
    error: message,
    errorType: "validation",
    details: {
      fieldErrors: error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
        code: issue.code,
      })),
    },
  });
}

function sendForbidden(reply: FastifyReply, message: string) {
  return reply.status(403).send({ success: false, error: message, errorType: "permission" });
}

function isAdministrator(caller: Caller): boolean {
  return caller.roles.includes("administrator");
}

function isQueryable(sink: AuditSink): sink is QueryableAuditSink {
  return (
    "query" in sink &&
    typeof sink.query === "function" &&
    "summary" in sink &&
    typeof sink.summary === "function"
  );
}

/**
 * Registers all workflow routes on the Fastify instance.
 */
export async function registerWorkflowRoutes(app: FastifyInstance) {
  // ---------------------------------------------------------------
  // Authentication middleware — runs before every request
  // ---------------------------------------------------------------
  app.addHook("preHandler", authMiddleware);

  // ---------------------------------------------------------------
  // Public endpoints (no auth required)
  // ---------------------------------------------------------------

  app.get("/api/health", async () => {
    return {
      status: "ok",
      templates: getAllTemplates().length,
      engine: isWorkflowEngineInitialized() ? "ready" : "uninitialized",
    };
  });

  /** Auth configuration — tells clients how to authenticate */
  app.get("/api/auth/config", async () => {
    return getAuthProvider().getPublicConfig();
  });

  // ---------------------------------------------------------------
  // Templates
  // ---------------------------------------------------------------

  app.get("/api/workflows/templates", async (request, reply) => {
    const query = templatesQuerySchema.safeParse(request.query);
    if (!query.success) return sendInvalid(reply, "Invalid query parameters", query.error);

    return sendResult(reply, getWorkflowEngine().listTemplates(query.data));
  });

  app.get<{ Params: { templateId: string } }>(
    "/api/workflows/templates/:templateId",
    async (request, reply) => {
      return sendResult(reply, getWorkflowEngine().getTemplate(request.params.templateId));
    }
  );

  // ---------------------------------------------------------------
  // Apply
  // ---------------------------------------------------------------

  app.post<{ Params: { templateId: string } }>(
    "/api/workflows/apply/:templateId",
    async (request, reply) => {
      const caller = getCaller(request);
      if (!isAdministrator(caller)) {
        return sendForbidden(reply, "Applying a workflow template requires the administrator role.");
      }

      const body = applyBodySchema.safeParse(request.body);
      if (!body.success) return sendInvalid(reply, "Invalid request body", body.error);

      const result = await getWorkflowEngine().applyTemplate({
        templateId: request.params.templateId,
        actingUserId: caller.userId,
        ...body.data,
      });
      return sendResult(reply, result, 201);
    }
  );

  app.post<{ Params: { templateId: string } }>(
    "/api/workflows/bulk-apply/:templateId",
    async (request, reply) => {
      const caller = getCaller(request);
      if (!isAdministrator(caller)) {
        return sendForbidden(reply, "Bulk application requires the administrator role.");
      }

      const body = bulkApplyBodySchema.safeParse(request.body);
      if (!body.success) return sendInvalid(reply, "Invalid request body", body.error);

      const result = await getWorkflowEngine().bulkApplyTemplate(
        {
          templateId: request.params.templateId,
          items: body.data.items,
          actingUserId: caller.userId,
        },
        { maxConcurrent: body.data.maxConcurrent }
      );
      return sendResult(reply, result);
    }
  );

  // ---------------------------------------------------------------
  // Transition
  // ---------------------------------------------------------------

  app.post("/api/workflows/transition", async (request, reply) => {
    const caller = getCaller(request);
    const body = transitionBodySchema.safeParse(request.body);
    if (!body.success) return sendInvalid(reply, "Invalid request body", body.error);

    const { contentUid, transitionId, role, comments } = body.data;
    if (!caller.roles.includes(role)) {
      return sendForbidden(reply, `You do not hold the "${role}" role.`);
    }

    const result = await getWorkflowEngine().executeTransition({
      contentUid,
      transitionId,
      actingUserId: caller.userId,
      actingRole: role,
      comments,
    });
    return sendResult(reply, result);
  });

  // ---------------------------------------------------------------
  // Content state and removal
  // ---------------------------------------------------------------

  app.get<{ Params: { contentUid: string } }>(
    "/api/workflows/content/:contentUid/state",
    async (request, reply) => {
      const caller = getCaller(request);
      const query = stateQuerySchema.safeParse(request.query);
      if (!query.success) return sendInvalid(reply, "Invalid query parameters", query.error);

      if (!caller.roles.includes(query.data.role)) {
        return sendForbidden(reply, `You do not hold the "${query.data.role}" role.`);
      }

      return sendResult(reply, getWorkflowEngine().getState(request.params.contentUid, query.data.role));
    }
  );

  app.delete<{ Params: { contentUid: string } }>(
    "/api/workflows/content/:contentUid",
    async (request, reply) => {
      const caller = getCaller(request);
      if (!isAdministrator(caller)) {
        return sendForbidden(reply, "Removing a workflow template requires the administrator role.");
      }

      const query = removeQuerySchema.safeParse(request.query);
      if (!query.success) return sendInvalid(reply, "Invalid query parameters", query.error);

      const result = await getWorkflowEngine().removeTemplate({
        contentUid: request.params.contentUid,
        actingUserId: caller.userId,
        restoreBackup: query.data.restoreBackup ?? false,
      });
      return sendResult(reply, result);
    }
  );

  // ---------------------------------------------------------------
  // Audit log
  // ---------------------------------------------------------------

  app.get("/api/workflows/audit", async (request, reply) => {
    if (!isAdministrator(getCaller(request))) {
      return sendForbidden(reply, "Reading the audit log requires the administrator role.");
    }

    const query = auditQuerySchema.safeParse(request.query);
    if (!query.success) return sendInvalid(reply, "Invalid query parameters", query.error);

    const sink = getWorkflowEngine().auditSink;
    if (!isQueryable(sink)) {
      return reply.status(501).send({
        success: false,
        error: "The configured audit sink cannot be queried.",
      });
    }

    return { success: true, data: await sink.query(query.data) };
  });

  app.get("/api/workflows/audit/summary", async (request, reply) => {
    if (!isAdministrator(getCaller(request))) {
      return sendForbidden(reply, "Reading the audit log requires the administrator role.");
    }

    const query = auditRangeSchema.safeParse(request.query);
    if (!query.success) return sendInvalid(reply, "Invalid query parameters", query.error);

    const sink = getWorkflowEngine().auditSink;
    if (!isQueryable(sink)) {
      return reply.status(501).send({
        success: false,
        error: "The configured audit sink cannot be queried.",
      });
    }

    return { success: true, data: await sink.summary(query.data) };
  });

  // ---------------------------------------------------------------
  // Global Fastify error handler — captures unhandled route errors
  // ---------------------------------------------------------------

  app.setErrorHandler(async (error, request, reply) => {
    const statusCode =
      typeof error === "object" &&
      error !== null &&
      "statusCode" in error &&
      typeof error.statusCode === "number"
        ? error.statusCode
        : 500;

    // Client errors raised by Fastify itself (malformed JSON, oversized body)
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        success: false,
        error: error instanceof Error ? error.message : "Bad request",
      });
    }

    captureException(error instanceof Error ? error : new Error(String(error)), {
      url: request.url,
      method: request.method,
      userId: request.caller?.userId,
    });

    return reply.status(500).send({
      success: false,
      error: "An unexpected error occurred",
    });
  });
}
