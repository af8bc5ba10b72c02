/**
 * HTTP API for the beat catalog.
 *
 * Endpoints:
 * - GET /api/beats - List all beats (syncs the beats folder first)
 * - POST /api/beats - Add a beat by hand
 * - GET /api/beats/:id - Get beat metadata
 * - GET|HEAD /api/audio/:fileName - Stream a beat's audio
 * - POST /api/inquiry - Submit an exclusive license inquiry
 * - GET /health - Service health check
 * - OPTIONS * - CORS preflight
 */

import type { IncomingMessage, ServerResponse } from "http";
import { createReadStream } from "fs";
import { stat } from "fs/promises";
import { resolve, sep } from "path";
import { pipeline } from "stream/promises";
import {
  AUDIO_ROUTE_PREFIX,
  VERSION,
  audioMimeTypeFor,
  type BeatDto,
  type ErrorResponse,
  type InquiryResponse,
} from "@beat-catalog/shared";
import {
  CatalogConflictError,
  CatalogValidationError,
  type CatalogService,
} from "../services/catalog.js";

// Inquiry bodies are a handful of short strings
const MAX_JSON_BODY_BYTES = 64 * 1024;

/** Everything a request handler needs, built once at startup */
export interface ApiContext {
  catalog: CatalogService;
  /** Directory audio files are served from */
  beatsFolder: string;
}

class RequestBodyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestBodyError";
  }
}

/**
 * Send JSON response.
 */
function sendJson(res: ServerResponse, statusCode: number, data: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

/**
 * Send error response.
 */
function sendError(res: ServerResponse, statusCode: number, message: string): void {
  const body: ErrorResponse = { error: message };
  sendJson(res, statusCode, body);
}

/**
 * Percent-encode the file name in a beat's audio locator.
 */
function encodeFileUrl(beat: BeatDto): BeatDto {
  return { ...beat, fileUrl: `${AUDIO_ROUTE_PREFIX}${encodeURIComponent(beat.fileName)}` };
}

/**
 * Read JSON body from request
 */
function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_JSON_BODY_BYTES) {
        tooLarge = true;
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (tooLarge) {
        reject(new RequestBodyError("Request body too large"));
        return;
      }
      try {
        const body = Buffer.concat(chunks).toString("utf-8");
        resolve(body ? JSON.parse(body) : {});
      } catch {
        reject(new RequestBodyError("Invalid JSON body"));
      }
    });
    req.on("error", reject);
  });
}

/**
 * Check that a resolved path lies strictly inside a directory.
 */
export function isInsideDirectory(root: string, candidate: string): boolean {
  const prefix = root.endsWith(sep) ? root : root + sep;
  return candidate.startsWith(prefix);
}

/**
 * Handle GET /api/beats
 */
async function handleListBeats(ctx: ApiContext, res: ServerResponse): Promise<void> {
  try {
    const beats = await ctx.catalog.listBeats();
    sendJson(res, 200, beats.map(encodeFileUrl));
  } catch (error) {
    console.error("[listBeats] error:", error);
    sendError(res, 500, "Internal server error");
  }
}

/**
 * Handle GET /api/beats/:id
 */
async function handleGetBeat(ctx: ApiContext, res: ServerResponse, rawId: string): Promise<void> {
  try {
    const beat = await ctx.catalog.getBeat(rawId);

    if (!beat) {
      sendError(res, 404, "Beat not found");
      return;
    }

    sendJson(res, 200, encodeFileUrl(beat));
  } catch (error) {
    if (error instanceof CatalogValidationError) {
      console.log("[getBeat] Validation error:", error.message);
      sendError(res, 400, error.message);
    } else {
      console.error("[getBeat] error:", error);
      sendError(res, 500, "Internal server error");
    }
  }
}

/**
 * Handle POST /api/beats
 */
async function handleAddBeat(
  ctx: ApiContext,
  req: IncomingMessage,
  res: ServerResponse
): Promise<void> {
  try {
    const body = await readJsonBody(req);
    const beat = await ctx.catalog.addBeat(body);

    console.log(`[addBeat] Success: beatId=${beat.id}, fileName=${beat.fileName}`);
    sendJson(res, 201, encodeFileUrl(beat));
  } catch (error) {
    if (error instanceof RequestBodyError || error instanceof CatalogValidationError) {
      console.log("[addBeat] Validation error:", error.message);
      sendError(res, 400, error.message);
    } else if (error instanceof CatalogConflictError) {
      console.log("[addBeat] Conflict:", error.message);
      sendError(res, 409, error.message);
    } else {
      console.error("[addBeat] error:", error);
      sendError(res, 500, "Internal server error");
    }
  }
}

/**
 * Handle GET or HEAD /api/audio/:fileName
 *
 * The file is streamed in chunks; pipeline() closes the file on
 * completion, on error, and when the client goes away.
 */
async function handleAudioStream(
  ctx: ApiContext,
  res: ServerResponse,
  encodedName: string,
  headOnly: boolean
): Promise<void> {
  let fileName: string;
  try {
    fileName = decodeURIComponent(encodedName);
  } catch {
    sendError(res, 400, "Invalid file name");
    return;
  }

  const root = resolve(ctx.beatsFolder);
  const filePath = resolve(root, fileName);

  if (!isInsideDirectory(root, filePath)) {
    console.log(`[audio] Rejected path outside beats folder: ${fileName}`);
    sendError(res, 403, "Forbidden");
    return;
  }

  let size: number;
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      sendError(res, 404, "File not found");
      return;
    }
    size = info.size;
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "ENOENT" || code === "ENOTDIR") {
      console.log(`[audio] File not found: ${filePath}`);
      sendError(res, 404, "File not found");
      return;
    }
    console.error("[audio] stat error:", error);
    sendError(res, 500, "Internal server error");
    return;
  }

  res.writeHead(200, {
    "Content-Type": audioMimeTypeFor(fileName),
    "Content-Length": size,
    "Accept-Ranges": "bytes",
  });

  if (headOnly) {
    res.end();
    return;
  }

  try {
    await pipeline(createReadStream(filePath), res);
  } catch (error) {
    // Headers are already out; all that is left is to drop the connection
    console.error(`[audio] Stream aborted for ${fileName}:`, error);
    res.destroy();
  }
}

/**
 * Handle POST /api/inquiry
 */
async function handleInquiry(
  ctx: ApiContext,
  req: IncomingMessage,
  res: ServerResponse
): Promise<void> {
  try {
    const body = await readJsonBody(req);
    const inquiryId = await ctx.catalog.submitInquiry(body);

    console.log(`[inquiry] Success: inquiryId=${inquiryId}`);

    const response: InquiryResponse = {
      success: true,
      inquiryId,
      message: "Inquiry submitted successfully",
    };
    sendJson(res, 200, response);
  } catch (error) {
    if (error instanceof RequestBodyError || error instanceof CatalogValidationError) {
      console.log("[inquiry] Validation error:", error.message);
      sendError(res, 400, error.message);
    } else {
      console.error("[inquiry] Server error:", error);
      sendError(res, 500, "Internal server error");
    }
  }
}

/**
 * Handle GET /health
 */
async function handleHealth(ctx: ApiContext, res: ServerResponse): Promise<void> {
  try {
    sendJson(res, 200, {
      status: "ok",
      version: VERSION,
      beats: await ctx.catalog.countBeats(),
    });
  } catch (error) {
    console.error("[health] error:", error);
    sendError(res, 500, "Internal server error");
  }
}

/**
 * Main HTTP request handler for the catalog API.
 * Returns false when no route matched.
 */
export async function handleCatalogApiRequest(
  ctx: ApiContext,
  req: IncomingMessage,
  res: ServerResponse
): Promise<boolean> {
  const method = req.method || "GET";
  const path = new URL(req.url || "/", "http://localhost").pathname;
  // URL parsing drops dot segments; the audio route needs them for the folder check
  const rawPath = (req.url || "/").split("?")[0] ?? "/";

  if (path.startsWith("/api/")) {
    console.log(`[API] ${method} ${req.url}`);
  }

  // GET /health
  if (method === "GET" && path === "/health") {
    await handleHealth(ctx, res);
    return true;
  }

  // GET /api/beats
  if (method === "GET" && path === "/api/beats") {
    await handleListBeats(ctx, res);
    return true;
  }

  // POST /api/beats
  if (method === "POST" && path === "/api/beats") {
    await handleAddBeat(ctx, req, res);
    return true;
  }

  // GET /api/beats/:id
  const beatMatch = path.match(/^\/api\/beats\/([^/]+)$/);
  if (method === "GET" && beatMatch && beatMatch[1]) {
    await handleGetBeat(ctx, res, beatMatch[1]);
    return true;
  }

  // GET or HEAD /api/audio/:fileName
  const audioMatch = rawPath.match(/^\/api\/audio\/(.+)$/);
  if ((method === "GET" || method === "HEAD") && audioMatch && audioMatch[1]) {
    await handleAudioStream(ctx, res, audioMatch[1], method === "HEAD");
    return true;
  }

  // POST /api/inquiry
  if (method === "POST" && path === "/api/inquiry") {
    await handleInquiry(ctx, req, res);
    return true;
  }

  return false;
}

/**
 * Build the request listener for http.createServer: CORS on every
 * response, preflight, routing, and a 500 for anything that escapes
 * a handler so one bad request never takes the process down.
 */
export function createRequestListener(
  ctx: ApiContext
): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, HEAD, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.writeHead(200);
      res.end();
      return;
    }

    handleCatalogApiRequest(ctx, req, res)
      .then((handled) => {
        if (!handled) {
          sendError(res, 404, "Not found");
        }
      })
      .catch((error: unknown) => {
        console.error("[API] Unhandled error:", error);
        if (!res.headersSent) {
          sendError(res, 500, "Internal server error");
        } else {
          res.destroy();
        }
      });
  };
}
