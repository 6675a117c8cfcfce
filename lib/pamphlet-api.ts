import { isPamphletError, PamphletError, type PamphletErrorKind } from "@/lib/pamphlet-errors";

const DEFAULT_MAX_IMAGE_BYTES = 15 * 1024 * 1024;
const DATA_URL_PREFIX = /^data:image\/[a-z0-9.+-]+;base64,/i;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

const STATUS_BY_KIND: Record<PamphletErrorKind, number> = {
  InvalidConfiguration: 400,
  DecodeFailure: 422
};

type JsonBodyResult =
  | {
      ok: true;
      body: Record<string, unknown>;
    }
  | {
      ok: false;
      response: Response;
    };

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function maxImageBytes(): number {
  const configured = Number.parseInt(process.env.PAMPHLET_MAX_IMAGE_BYTES?.trim() || "", 10);
  return Number.isFinite(configured) && configured > 0 ? configured : DEFAULT_MAX_IMAGE_BYTES;
}

export async function readJsonBody(request: Request): Promise<JsonBodyResult> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return {
      ok: false,
      response: Response.json({ error: "Request body must be valid JSON" }, { status: 400 })
    };
  }

  if (!isRecord(body)) {
    return {
      ok: false,
      response: Response.json({ error: "Request body must be a JSON object" }, { status: 400 })
    };
  }

  return { ok: true, body };
}

/**
 * Accepts raw base64 or a `data:image/...;base64,` URL and returns the decoded bytes.
 */
export function decodeBase64Image(value: unknown, field: string): Buffer {
  if (typeof value !== "string" || !value.trim()) {
    throw new PamphletError("InvalidConfiguration", `${field} must be a base64 encoded image`);
  }

  const payload = value.trim().replace(DATA_URL_PREFIX, "").replace(/\s+/g, "");
  if (!BASE64_PATTERN.test(payload)) {
    throw new PamphletError("DecodeFailure", `${field} is not valid base64`);
  }

  const limit = maxImageBytes();
  if (Math.floor((payload.length * 3) / 4) > limit + 2) {
    throw new PamphletError("InvalidConfiguration", `${field} exceeds the ${limit} byte upload limit`);
  }

  return Buffer.from(payload, "base64");
}

export function toBase64Png(png: Buffer): string {
  return png.toString("base64");
}

export function errorResponse(error: unknown, scope: string): Response {
  if (isPamphletError(error)) {
    console.warn(`[${scope}] ${error.kind}: ${error.message}`);
    return Response.json(
      { error: error.message, kind: error.kind, issues: error.issues },
      { status: STATUS_BY_KIND[error.kind] }
    );
  }

  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`[${scope}] unexpected failure`, error);
  return Response.json({ error: message }, { status: 500 });
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}
