export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Compliance Engine API",
      version: "0.1.0",
      description: "Role registry, batch lifecycle, certificate minting and audit trail.",
    },
    servers: [{ url: serviceBaseUrl }],
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: {
            "200": { description: "Service healthy" },
          },
        },
      },
      "/minter/status": {
        get: {
          summary: "Certificate minter configuration and chain reachability",
          responses: {
            "200": { description: "Minter status" },
          },
        },
      },
      "/roles/assign": {
        post: {
          summary: "Assign the vendor (1) or inspector (2) role to an account (administrator only)",
          responses: {
            "200": { description: "Role assigned" },
            "400": { description: "Invalid request, caller or role" },
            "401": { description: "Missing service token" },
            "403": { description: "Caller is not the administrator" },
          },
        },
      },
      "/roles/{account}": {
        get: {
          summary: "Get the role code of an account (0 admin, 1 vendor, 2 inspector, 99 none)",
          parameters: [
            {
              in: "path",
              name: "account",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Role code" },
            "400": { description: "Invalid account address" },
          },
        },
      },
      "/batches/create": {
        post: {
          summary: "Create a batch in CREATED state (vendor only)",
          responses: {
            "201": { description: "Batch created" },
            "400": { description: "Invalid request or batch id" },
            "401": { description: "Missing service token" },
            "403": { description: "Caller is not a vendor" },
            "409": { description: "Batch already exists" },
          },
        },
      },
      "/batches/approve": {
        post: {
          summary: "Move a batch from CREATED to APPROVED (inspector only)",
          responses: {
            "200": { description: "Batch approved" },
            "403": { description: "Caller is not an inspector" },
            "404": { description: "Batch not found" },
            "409": { description: "Batch is not CREATED" },
          },
        },
      },
      "/batches/certify": {
        post: {
          summary: "Move a batch from APPROVED to CERTIFIED and mint its certificate (administrator or inspector)",
          responses: {
            "200": { description: "Batch certified" },
            "403": { description: "Caller is not the administrator or an inspector" },
            "404": { description: "Batch not found" },
            "409": { description: "Batch is not APPROVED" },
            "502": { description: "Certificate minting failed" },
          },
        },
      },
      "/batches/{batchId}": {
        get: {
          summary: "Get batch status, status label and certificate asset id",
          parameters: [
            {
              in: "path",
              name: "batchId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Batch view (status 99 when unknown)" },
          },
        },
      },
      "/batches/{batchId}/status": {
        get: {
          summary: "Get batch status code (99 when unknown)",
          parameters: [
            {
              in: "path",
              name: "batchId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Status code" },
          },
        },
      },
      "/batches/{batchId}/asset": {
        get: {
          summary: "Get certificate asset id (0 when not certified)",
          parameters: [
            {
              in: "path",
              name: "batchId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Asset id" },
          },
        },
      },
      "/vendors/{vendor}/batches": {
        get: {
          summary: "List batch ids created by a vendor, in creation order",
          parameters: [
            {
              in: "path",
              name: "vendor",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Batch ids and pipe-joined form" },
            "400": { description: "Invalid vendor address" },
          },
        },
      },
      "/audit/events": {
        get: {
          summary: "List audit events, optionally filtered by name, subject hex or caller",
          responses: {
            "200": { description: "Audit events in sequence order" },
            "400": { description: "Unknown event name" },
          },
        },
      },
      "/audit/verify": {
        get: {
          summary: "Verify the audit event hash chain",
          responses: {
            "200": { description: "Verification result" },
          },
        },
      },
    },
  };
}
