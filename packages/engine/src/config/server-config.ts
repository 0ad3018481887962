export interface ProxyRouteConfig {
  kind: "proxy";
  /** URI prefix this route answers for. */
  prefix: string;
  targetHost: string;
  /** Default: 443 with TLS, 80 without */
  targetPort: number;
  /** Speak TLS to the target. Default: true */
  tls: boolean;
}

export interface StaticRouteConfig {
  kind: "static";
  prefix: string;
  /** Directory to serve. */
  root: string;
}

export type RouteConfig = ProxyRouteConfig | StaticRouteConfig;

export interface ServerConfig {
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Routes in match order; the first matching prefix wins. */
  routes: RouteConfig[];
  /** Suppress per-request logging. Default: false */
  quiet: boolean;
  /** Max time allowed for receiving a request head. Default: 5000ms */
  requestTimeoutMs: number;
  /** Largest header block accepted from either peer. Default: 64KB */
  maxHeaderSize: number;
}

export function defaultConfig(): ServerConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    routes: [],
    quiet: false,
    requestTimeoutMs: 5000,
    maxHeaderSize: 64 * 1024,
  };
}

/**
 * Parse a `host[:port]` proxy target. The port defaults to 443, or 80 when
 * `tls` is off.
 */
export function proxyRoute(
  prefix: string,
  target: string,
  tls = true,
): ProxyRouteConfig {
  const colon = target.lastIndexOf(":");
  const hasPort = colon >= 0 && /^\d+$/.test(target.slice(colon + 1));
  const targetHost = hasPort ? target.slice(0, colon) : target;
  const targetPort = hasPort
    ? Number.parseInt(target.slice(colon + 1), 10)
    : tls
      ? 443
      : 80;

  if (!targetHost) {
    throw new Error(`Invalid proxy target: '${target}'`);
  }
  if (targetPort < 1 || targetPort > 65535) {
    throw new Error(`Invalid proxy target port: '${target}'`);
  }
  return { kind: "proxy", prefix, targetHost, targetPort, tls };
}
