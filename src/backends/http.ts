import http from "node:http";
import https from "node:https";
import { createLogger } from "../logger.js";

const log = createLogger("http");

export interface HttpRequestOptions {
  method: "GET" | "POST";
  url: string;
  body?: object;
  timeoutMs: number;
  headers?: Record<string, string>;
  /** Label for log lines and error messages */
  label: string;
}

/**
 * Minimal JSON-over-HTTP request on node:http/https.
 * Resolves with the raw body; HTTP status >= 400 rejects.
 */
export function httpRequest(options: HttpRequestOptions): Promise<string> {
  const { method, url, body, timeoutMs, label } = options;
  return new Promise((resolve, reject) => {
    const parsed = new URL(url);
    const isHttps = parsed.protocol === "https:";
    const transport = isHttps ? https : http;

    const headers: Record<string, string> = {
      "Accept": "application/json",
      ...options.headers,
    };

    const payload = body ? JSON.stringify(body) : undefined;
    if (payload) {
      headers["Content-Type"] = "application/json";
      headers["Content-Length"] = String(Buffer.byteLength(payload));
    }

    const req = transport.request(
      {
        hostname: parsed.hostname,
        port: parsed.port || (isHttps ? 443 : 80),
        path: parsed.pathname + parsed.search,
        method,
        headers,
        timeout: timeoutMs,
      },
      (res) => {
        let data = "";
        res.setEncoding("utf-8");
        res.on("data", (chunk: string) => (data += chunk));
        res.on("end", () => {
          if (res.statusCode && res.statusCode >= 400) {
            const err = new Error(`${label} API error ${res.statusCode}: ${data}`);
            log.error(label, err.message);
            reject(err);
          } else {
            resolve(data);
          }
        });
      }
    );

    req.on("error", (err) => {
      log.error(label, `HTTP ${method} error:`, err.message);
      reject(err);
    });

    req.on("timeout", () => {
      req.destroy();
      const err = new Error(`${label} request timeout after ${timeoutMs}ms`);
      log.error(label, err.message);
      reject(err);
    });

    if (payload) {
      req.write(payload);
    }
    req.end();
  });
}

/** JSON.parse that reports which backend sent the bad body. */
export function parseJson(raw: string, label: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new Error(`${label}: response is not valid JSON (${raw.slice(0, 120)})`);
  }
}
