import Fastify from "fastify";
import type { FastifyReply, FastifyRequest } from "fastify";
import {
  type AssignRoleRequest,
  type AssignRoleResponse,
  type AuditEventFilter,
  BATCH_STATUS_LABELS,
  type BatchRequest,
  type BatchTransitionResponse,
  CALLER_HEADER,
  type CertifyBatchResponse,
  type ComplianceErrorCode,
  type ErrorResponse,
  type GetBatchAssetResponse,
  type GetBatchResponse,
  type GetBatchStatusResponse,
  type GetRoleResponse,
  type GetVendorBatchesResponse,
  isAuditEventName,
  isServiceAuthAuthorized,
  type ListAuditEventsResponse,
  parseCallerHeader,
  ROLE_LABELS,
  SERVICE_AUTH_HEADER,
  type VerifyAuditChainResponse,
} from "@cledger/shared";
import {
  type Account,
  deriveEngineAccount,
  parseAccount,
  requireAccount,
} from "./core/account.js";
import { ComplianceEngine } from "./core/engine.js";
import type { Failure } from "./core/result.js";
import { joinBatchList } from "./core/vendors.js";
import { buildChainMinterFromEnv, type ChainMinterStatus } from "./minting/chain-minter.js";
import { LocalCertificateMinter } from "./minting/local-minter.js";
import type { CertificateMinter } from "./minting/minter.js";
import { buildOpenApiSpec } from "./openapi.js";
import type { LedgerStore } from "./storage/ledger-store.js";
import { SqliteLedgerStore } from "./storage/sqlite-store.js";

const DEFAULT_DB_PATH = "data/compliance-engine.db";

const ERROR_HTTP_STATUS: Record<ComplianceErrorCode, number> = {
  UNAUTHORIZED: 403,
  INVALID_ARGUMENT: 400,
  ALREADY_EXISTS: 409,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  MINTING_FAILURE: 502,
};

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function parseAssignRoleRequest(body: unknown): AssignRoleRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.account)) return null;
  if (typeof body.role !== "number" || !Number.isInteger(body.role)) return null;
  // Out-of-range codes go through so the registry can answer INVALID_ARGUMENT.
  return { account: body.account, role: body.role };
}

function parseBatchRequest(body: unknown): BatchRequest | null {
  if (!isObject(body)) return null;
  if (typeof body.batchId !== "string") return null;
  return { batchId: body.batchId };
}

function sendError(reply: FastifyReply, statusCode: number, body: ErrorResponse) {
  return reply.code(statusCode).send(body);
}

function sendFailure(reply: FastifyReply, failure: Failure) {
  return sendError(reply, ERROR_HTTP_STATUS[failure.error.code], {
    error: failure.error.code.toLowerCase(),
    message: failure.error.message,
  });
}

export interface BuildServerOptions {
  store?: LedgerStore;
  dbPath?: string;
  adminAddress?: string;
  engineAddress?: string;
  minter?: CertificateMinter;
  serviceAuthToken?: string;
  serviceBaseUrl?: string;
  clock?: () => Date;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const adminAddress = options.adminAddress || process.env.ADMIN_ADDRESS;
  if (!adminAddress) {
    throw new Error("ADMIN_ADDRESS is required (or pass adminAddress in buildServer options)");
  }
  const administrator = requireAccount(adminAddress, "ADMIN_ADDRESS");
  const engineAddress = options.engineAddress || process.env.ENGINE_ADDRESS;
  const engineAccount = engineAddress
    ? requireAccount(engineAddress, "ENGINE_ADDRESS")
    : deriveEngineAccount(administrator);

  const chainMinter = options.minter ? null : buildChainMinterFromEnv();
  const minter = options.minter ?? chainMinter ?? new LocalCertificateMinter();

  const store =
    options.store ||
    new SqliteLedgerStore(options.dbPath || process.env.COMPLIANCE_DB_PATH || DEFAULT_DB_PATH);
  const ownStore = !options.store;
  const serviceAuthToken = options.serviceAuthToken ?? process.env.SERVICE_AUTH_TOKEN;
  const serviceBaseUrl =
    options.serviceBaseUrl ||
    process.env.SERVICE_BASE_URL ||
    `http://127.0.0.1:${process.env.PORT || 4201}`;

  const app = Fastify({ logger: true });
  const engine = new ComplianceEngine({
    store,
    administrator,
    engineAccount,
    minter,
    clock: options.clock,
  });

  app.log.info(
    {
      administrator: administrator.address,
      engine: engineAccount.address,
      minter: chainMinter ? "chain" : minter instanceof LocalCertificateMinter ? "local" : "custom",
    },
    "compliance engine configured",
  );

  function requireServiceAuth(req: FastifyRequest, reply: FastifyReply): boolean {
    if (isServiceAuthAuthorized(req.headers[SERVICE_AUTH_HEADER], serviceAuthToken)) {
      return true;
    }
    sendError(reply, 401, {
      error: "unauthorized_service",
      message: `Missing or invalid '${SERVICE_AUTH_HEADER}' header`,
    });
    return false;
  }

  function requireCaller(req: FastifyRequest, reply: FastifyReply): Account | null {
    const caller = parseAccount(parseCallerHeader(req.headers[CALLER_HEADER]));
    if (caller) return caller;
    sendError(reply, 400, {
      error: "invalid_caller",
      message: `Missing or invalid '${CALLER_HEADER}' header`,
    });
    return null;
  }

  app.get("/health", async () => ({ ok: true, service: "compliance-engine" }));
  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));

  app.get("/minter/status", async () => {
    if (!chainMinter) {
      const status: ChainMinterStatus = { configured: false };
      return status;
    }
    return chainMinter.status();
  });

  app.post("/roles/assign", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const parsed = parseAssignRoleRequest(req.body);
    const account = parsed ? parseAccount(parsed.account) : null;
    if (!parsed || !account) {
      return sendError(reply, 400, {
        error: "invalid_request",
        message: "Expected account address and integer role",
      });
    }

    const result = await engine.assignRole(caller, account, parsed.role);
    if (!result.ok) return sendFailure(reply, result);

    req.log.info({ events: result.value.events }, "role assigned");
    const response: AssignRoleResponse = {
      account: account.address,
      role: result.value.value,
      roleLabel: ROLE_LABELS[result.value.value],
      events: result.value.events,
    };
    return response;
  });

  app.get("/roles/:account", async (req, reply) => {
    const params = req.params as { account?: string };
    const account = parseAccount(params.account);
    if (!account) {
      return sendError(reply, 400, { error: "invalid_account" });
    }
    const role = engine.getRole(account);
    const response: GetRoleResponse = {
      account: account.address,
      role,
      roleLabel: ROLE_LABELS[role],
    };
    return response;
  });

  app.post("/batches/create", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const parsed = parseBatchRequest(req.body);
    if (!parsed) {
      return sendError(reply, 400, { error: "invalid_request", message: "Expected batchId" });
    }

    const result = await engine.createBatch(caller, parsed.batchId);
    if (!result.ok) return sendFailure(reply, result);

    req.log.info({ events: result.value.events }, "batch created");
    const response: BatchTransitionResponse = {
      batchId: parsed.batchId,
      status: result.value.value,
      statusLabel: BATCH_STATUS_LABELS[result.value.value],
      events: result.value.events,
    };
    return reply.code(201).send(response);
  });

  app.post("/batches/approve", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const parsed = parseBatchRequest(req.body);
    if (!parsed) {
      return sendError(reply, 400, { error: "invalid_request", message: "Expected batchId" });
    }

    const result = await engine.approveBatch(caller, parsed.batchId);
    if (!result.ok) return sendFailure(reply, result);

    req.log.info({ events: result.value.events }, "batch approved");
    const response: BatchTransitionResponse = {
      batchId: parsed.batchId,
      status: result.value.value,
      statusLabel: BATCH_STATUS_LABELS[result.value.value],
      events: result.value.events,
    };
    return response;
  });

  app.post("/batches/certify", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const parsed = parseBatchRequest(req.body);
    if (!parsed) {
      return sendError(reply, 400, { error: "invalid_request", message: "Expected batchId" });
    }

    const result = await engine.certifyBatch(caller, parsed.batchId);
    if (!result.ok) {
      if (result.error.code === "MINTING_FAILURE") {
        req.log.error({ batchId: parsed.batchId, err: result.error.message }, "certificate minting failed");
      }
      return sendFailure(reply, result);
    }

    req.log.info({ events: result.value.events, assetId: result.value.value.assetId }, "batch certified");
    const response: CertifyBatchResponse = {
      batchId: parsed.batchId,
      status: result.value.value.status,
      statusLabel: BATCH_STATUS_LABELS[result.value.value.status],
      assetId: result.value.value.assetId,
      events: result.value.events,
    };
    return response;
  });

  app.get("/batches/:batchId", async (req) => {
    const params = req.params as { batchId: string };
    const view = engine.getBatch(params.batchId);
    const response: GetBatchResponse = { batchId: params.batchId, ...view };
    return response;
  });

  app.get("/batches/:batchId/status", async (req) => {
    const params = req.params as { batchId: string };
    const response: GetBatchStatusResponse = {
      batchId: params.batchId,
      status: engine.getBatchStatus(params.batchId),
    };
    return response;
  });

  app.get("/batches/:batchId/asset", async (req) => {
    const params = req.params as { batchId: string };
    const response: GetBatchAssetResponse = {
      batchId: params.batchId,
      assetId: engine.getBatchAsset(params.batchId),
    };
    return response;
  });

  app.get("/vendors/:vendor/batches", async (req, reply) => {
    const params = req.params as { vendor?: string };
    const vendor = parseAccount(params.vendor);
    if (!vendor) {
      return sendError(reply, 400, { error: "invalid_vendor" });
    }
    const batches = engine.getVendorBatches(vendor);
    const response: GetVendorBatchesResponse = {
      vendor: vendor.address,
      batches,
      joined: joinBatchList(batches),
    };
    return response;
  });

  app.get("/audit/events", async (req, reply) => {
    const query = req.query as { name?: string; subject?: string; caller?: string };
    const name = query.name;
    if (name !== undefined && !isAuditEventName(name)) {
      return sendError(reply, 400, { error: "invalid_event_name" });
    }
    const filter: AuditEventFilter = {
      name,
      subjectHex: query.subject?.toLowerCase(),
      callerHex: query.caller?.toLowerCase().replace(/^0x/, ""),
    };
    const response: ListAuditEventsResponse = { events: engine.listAuditEvents(filter) };
    return response;
  });

  app.get("/audit/verify", async () => {
    const response: VerifyAuditChainResponse = engine.verifyAuditChain();
    return response;
  });

  app.addHook("onClose", async () => {
    if (ownStore) {
      store.close();
    }
  });

  return app;
}
