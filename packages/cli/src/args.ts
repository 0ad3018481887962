import * as path from "node:path";
import {
  defaultConfig,
  proxyRoute,
  type RouteConfig,
  type ServerConfig,
} from "@relayline/engine";

export type Verbosity = "quiet" | "normal" | "verbose";

export type CliCommand =
  | { kind: "run"; config: ServerConfig; verbosity: Verbosity }
  | { kind: "help" }
  | { kind: "version" };

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgumentError";
  }
}

interface RouteSpec {
  kind: RouteConfig["kind"];
  prefix: string;
  value: string;
}

export function parseArgs(args: string[], cwd: string = process.cwd()): CliCommand {
  const config = defaultConfig();
  const routes: RouteSpec[] = [];
  let plainTarget = false;
  let verbosity: Verbosity = "normal";

  let i = 0;
  const valueFor = (arg: string): string => {
    const value = args[++i];
    if (value === undefined) {
      throw new ArgumentError(`Missing value for ${arg}`);
    }
    return value;
  };

  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      config.port = parseInteger(arg, valueFor(arg), 0, 65535);
    } else if (arg === "--host" || arg === "-H") {
      config.host = valueFor(arg);
    } else if (arg === "--proxy") {
      routes.push(routeSpec("proxy", valueFor(arg)));
    } else if (arg === "--static") {
      routes.push(routeSpec("static", valueFor(arg)));
    } else if (arg === "--plain-target") {
      plainTarget = true;
    } else if (arg === "--max-header-size") {
      config.maxHeaderSize = parseInteger(arg, valueFor(arg), 1, Number.MAX_SAFE_INTEGER);
    } else if (arg === "--verbose" || arg === "-V") {
      verbosity = "verbose";
    } else if (arg === "--quiet" || arg === "-q") {
      verbosity = "quiet";
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else {
      throw new ArgumentError(`Unknown option: ${arg}`);
    }
    i++;
  }

  if (routes.length === 0) {
    throw new ArgumentError("At least one --proxy or --static route is required");
  }

  config.quiet = verbosity === "quiet";
  config.routes = routes.map((spec): RouteConfig =>
    spec.kind === "proxy"
      ? proxyRoute(spec.prefix, spec.value, !plainTarget)
      : { kind: "static", prefix: spec.prefix, root: path.resolve(cwd, spec.value) },
  );
  return { kind: "run", config, verbosity };
}

function routeSpec(kind: RouteConfig["kind"], value: string): RouteSpec {
  const eq = value.indexOf("=");
  if (eq <= 0 || eq === value.length - 1) {
    throw new ArgumentError(`Expected <prefix>=<${kind === "proxy" ? "host[:port]" : "dir"}>, got '${value}'`);
  }
  const prefix = value.slice(0, eq);
  if (!prefix.startsWith("/")) {
    throw new ArgumentError(`Route prefix must start with '/': '${prefix}'`);
  }
  return { kind, prefix, value: value.slice(eq + 1) };
}

function parseInteger(arg: string, value: string, min: number, max: number): number {
  const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (Number.isNaN(parsed) || parsed < min || parsed > max) {
    throw new ArgumentError(`Invalid value for ${arg}: '${value}'`);
  }
  return parsed;
}

export const HELP = `
relayline - rewriting HTTP/1.x relay

Usage: relayline [options]

Routes (tried in the order given, first matching prefix wins):
  --proxy <prefix>=<host>[:port]  Relay matching requests to a target (TLS, port 443)
  --static <prefix>=<dir>         Serve files from a directory

Options:
  --port, -p <port>          Port to listen on (default: 8080)
  --host, -H <host>          Host to bind (default: 127.0.0.1)
  --plain-target             Talk to proxy targets without TLS (default port 80)
  --max-header-size <bytes>  Largest header block accepted (default: 65536)
  --verbose, -V              Log relayed traffic
  --quiet, -q                Suppress request logging
  --version, -v              Show version
  --help, -h                 Show this help
`;
