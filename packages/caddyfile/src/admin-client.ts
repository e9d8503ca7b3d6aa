import { deadline, untilAborted } from "./abort.js";
import { AdminError, AdminProtocolError, AdminUnreachableError, causeMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  adminDurationHistogram,
  adminErrorCounter,
  adminRequestCounter,
  roundMs,
  withSpan,
} from "./telemetry.js";

export type AdminClientOptions = {
  /** Fetch implementation (override for testing) */
  fetch?: typeof fetch;
  /** Per-request timeout in milliseconds (default 30000) */
  timeoutMs?: number;
  logger?: Logger;
};

export type RequestOptions = {
  signal?: AbortSignal;
};

export type AdminStatus = {
  running: boolean;
  /** Value of the `Server` response header, when the server sends one */
  version?: string;
};

/** A warning the Caddyfile adapter attached to an otherwise successful adapt. */
export type AdaptWarning = {
  file?: string;
  line?: number;
  directive?: string;
  message: string;
};

export type AdaptResult = {
  /** The adapted JSON configuration, untouched */
  config: unknown;
  warnings: AdaptWarning[];
};

/** Certificate authority details from `GET /pki/ca/<id>` */
export type CaInfo = {
  id: string;
  name: string;
  rootCommonName: string;
  intermediateCommonName: string;
  rootCertificate?: string;
  intermediateCertificate?: string;
};

type AdminRequest = RequestOptions & {
  method: "GET" | "POST";
  path: string;
  body?: string;
  contentType?: string;
  accept?: string;
};

const CADDYFILE_CONTENT_TYPE = "text/caddyfile";

/**
 * Client for the Caddy admin API (default `http://localhost:2019`).
 *
 * Every call is bounded by the client timeout and the caller's signal;
 * aborting cancels the underlying request, body included. Nothing is
 * retried. Non-2xx answers throw `AdminError`, a 2xx body that cannot be
 * used `AdminProtocolError`, transport failures `AdminUnreachableError`.
 */
export class AdminClient {
  readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(baseUrl: string, options?: AdminClientOptions) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.fetchFn = options?.fetch ?? globalThis.fetch;
    this.timeoutMs = options?.timeoutMs ?? 30_000;
    this.logger = options?.logger ?? silentLogger;
  }

  /** Replace the running configuration with Caddyfile text (`POST /load`). */
  async load(caddyfile: string, options?: RequestOptions): Promise<void> {
    const request: AdminRequest = {
      ...options,
      method: "POST",
      path: "/load",
      body: caddyfile,
      contentType: CADDYFILE_CONTENT_TYPE,
    };
    await this.request("load", request, async (response) => {
      if (!response.ok) throw await failure(response);
    });
  }

  /** Adapt Caddyfile text to JSON without applying it (`POST /adapt`). */
  async adapt(caddyfile: string, options?: RequestOptions): Promise<AdaptResult> {
    const request: AdminRequest = {
      ...options,
      method: "POST",
      path: "/adapt",
      body: caddyfile,
      contentType: CADDYFILE_CONTENT_TYPE,
      accept: "application/json",
    };
    return this.request("adapt", request, async (response): Promise<AdaptResult> => {
      if (!response.ok) throw await failure(response);

      const body = await readJson(response);
      if (!isRecord(body)) return { config: body, warnings: [] };
      return {
        config: "result" in body ? body.result : body,
        warnings: Array.isArray(body.warnings) ? body.warnings.filter(isRecord).map(toWarning) : [],
      };
    });
  }

  /** The running configuration as raw JSON bytes (`GET /config/`). */
  async getConfig(options?: RequestOptions): Promise<Uint8Array> {
    const request: AdminRequest = { ...options, method: "GET", path: "/config/", accept: "application/json" };
    return this.request("config", request, async (response) => {
      if (!response.ok) throw await failure(response);
      return new Uint8Array(await response.arrayBuffer());
    });
  }

  /**
   * Details of a PKI certificate authority (usually `"local"`), or `null`
   * when the PKI app has no such CA.
   */
  async getPkiCa(id = "local", options?: RequestOptions): Promise<CaInfo | null> {
    const request: AdminRequest = {
      ...options,
      method: "GET",
      path: `/pki/ca/${encodeURIComponent(id)}`,
      accept: "application/json",
    };
    return this.request("pki", request, async (response): Promise<CaInfo | null> => {
      if (response.status === 404) {
        await response.body?.cancel();
        return null;
      }
      if (!response.ok) throw await failure(response);

      const body = await readJson(response);
      if (!isRecord(body)) {
        throw new AdminProtocolError(response.status, "expected a JSON object for the certificate authority");
      }
      return {
        id: stringField(body, "id") ?? id,
        name: stringField(body, "name") ?? "",
        rootCommonName: stringField(body, "root_common_name") ?? "",
        intermediateCommonName: stringField(body, "intermediate_common_name") ?? "",
        rootCertificate: stringField(body, "root_certificate"),
        intermediateCertificate: stringField(body, "intermediate_certificate"),
      };
    });
  }

  /** Whether the admin endpoint answers at all; any HTTP answer counts. */
  async getStatus(options?: RequestOptions): Promise<AdminStatus> {
    const request: AdminRequest = { ...options, method: "GET", path: "/config/" };
    try {
      return await this.request("status", request, async (response): Promise<AdminStatus> => {
        await response.body?.cancel();
        const server = response.headers.get("server");
        return server ? { running: true, version: server } : { running: true };
      });
    } catch (err) {
      if (err instanceof AdminUnreachableError) return { running: false };
      throw err;
    }
  }

  /** Resolves when the admin endpoint answers; throws `AdminUnreachableError` otherwise. */
  async ping(options?: RequestOptions): Promise<void> {
    await this.request("ping", { ...options, method: "GET", path: "/config/" }, async (response) => {
      await response.body?.cancel();
    });
  }

  /** Gracefully stop the server (`POST /stop`). */
  async stop(options?: RequestOptions): Promise<void> {
    await this.request("stop", { ...options, method: "POST", path: "/stop" }, async (response) => {
      if (!response.ok) throw await failure(response);
    });
  }

  /**
   * Send one request and hand the response to `read`. The deadline covers
   * the body as well as the headers: it is only released once `read` settles.
   */
  private async request<T>(op: string, req: AdminRequest, read: (response: Response) => Promise<T>): Promise<T> {
    const url = this.baseUrl + req.path;
    const attrs = { "caddyfile.admin.op": op, "http.request.method": req.method };
    const headers: Record<string, string> = {};
    if (req.contentType) headers["Content-Type"] = req.contentType;
    if (req.accept) headers["Accept"] = req.accept;

    return withSpan(`caddyfile.admin.${op}`, attrs, async () => {
      const guard = deadline(this.timeoutMs, req.signal);
      const start = performance.now();
      adminRequestCounter.add(1, attrs);
      try {
        const response = await this.fetchFn(url, {
          method: req.method,
          headers,
          body: req.body,
          signal: guard.signal,
        });
        const durationMs = roundMs(performance.now() - start);
        adminDurationHistogram.record(durationMs, attrs);
        if (!response.ok) adminErrorCounter.add(1, attrs);
        this.logger.debug("[caddyfile] admin %s %s -> %d in %dms", req.method, req.path, response.status, durationMs);
        return await untilAborted(guard.signal, read(response));
      } catch (err) {
        // An answer that arrived in full is not a transport failure
        if (err instanceof AdminError || err instanceof AdminProtocolError) throw err;
        adminErrorCounter.add(1, attrs);
        const reason = guard.timedOut() ? "timeout" : req.signal?.aborted ? "aborted" : "network";
        this.logger.warn("[caddyfile] admin %s %s failed (%s): %s", req.method, req.path, reason, causeMessage(err));
        throw new AdminUnreachableError(url, reason, { cause: err });
      } finally {
        guard.dispose();
      }
    });
  }
}

/** Build an AdminError from a non-2xx response, preferring a JSON `error` field. */
async function failure(response: Response): Promise<AdminError> {
  const text = (await response.text()).trim();
  let detail = text;
  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed) && typeof parsed.error === "string" && parsed.error !== "") detail = parsed.error;
  } catch {
    // not JSON: the body text is the message
  }
  return new AdminError(response.status, detail);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new AdminProtocolError(response.status, `invalid JSON in response: ${causeMessage(err)}`, { cause: err });
  }
}

function toWarning(raw: Record<string, unknown>): AdaptWarning {
  const line = raw.line;
  return {
    file: stringField(raw, "file"),
    line: typeof line === "number" ? line : undefined,
    directive: stringField(raw, "directive"),
    message: stringField(raw, "message") ?? "",
  };
}
