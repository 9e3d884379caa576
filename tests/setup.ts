/**
 * Mocha bootstrap keeping the suite hermetic: any attempt to reach a host
 * other than loopback fails fast with `E-NETWORK-BLOCKED`. Backend calls are
 * served by in-process fakes injected through `fetchImpl`; only the HTTP
 * transport tests open loopback sockets. The patched primitives are restored
 * once Mocha finishes.
 */

import { after } from "mocha";
import { Socket } from "node:net";

type RestoreHook = () => void;

const restores: RestoreHook[] = [];
const LOOPBACK_HOSTS = new Set(["127.0.0.1", "::1", "localhost"]);

class NetworkBlockedError extends Error {
  readonly code = "E-NETWORK-BLOCKED";

  constructor(via: string, target: string) {
    super(`network access via ${via} to ${target} is disabled during tests`);
    this.name = "NetworkBlockedError";
  }
}

/** Normalises IPv4/IPv6 textual representations for comparison. */
function normaliseHost(host: string): string {
  const trimmed = host.trim().toLowerCase();
  return trimmed.startsWith("[") && trimmed.endsWith("]") ? trimmed.slice(1, -1) : trimmed;
}

/** Extracts the destination host from the various `Socket#connect` signatures. */
function connectionHost(args: readonly unknown[]): string {
  const [first, second] = args;
  if (typeof first === "object" && first !== null) {
    if ("path" in first && typeof first.path === "string") {
      return "localhost";
    }
    const host: unknown = "host" in first ? first.host : undefined;
    return typeof host === "string" ? host : "localhost";
  }
  if (typeof first === "string" && first.startsWith("/")) {
    return "localhost";
  }
  return typeof second === "string" ? second : "localhost";
}

function installSocketGuard(): void {
  const originalConnect = Socket.prototype.connect;
  const guarded = function (this: Socket, ...args: unknown[]): Socket {
    const host = connectionHost(args);
    if (!LOOPBACK_HOSTS.has(normaliseHost(host))) {
      throw new NetworkBlockedError("net.Socket#connect", host);
    }
    return Reflect.apply(originalConnect, this, args);
  };
  // The overloaded signature cannot be expressed by a single implementation.
  Socket.prototype.connect = guarded as typeof Socket.prototype.connect;
  restores.push(() => {
    Socket.prototype.connect = originalConnect;
  });
}

function requestHost(input: Parameters<typeof fetch>[0]): string {
  try {
    if (typeof input === "string") {
      return new URL(input).hostname;
    }
    if (input instanceof URL) {
      return input.hostname;
    }
    return new URL(input.url).hostname;
  } catch {
    return "unknown";
  }
}

function installFetchGuard(): void {
  const originalFetch = globalThis.fetch;
  globalThis.fetch = async (input, init) => {
    const host = requestHost(input);
    if (!LOOPBACK_HOSTS.has(normaliseHost(host))) {
      throw new NetworkBlockedError("fetch", host);
    }
    return originalFetch(input, init);
  };
  restores.push(() => {
    globalThis.fetch = originalFetch;
  });
}

installSocketGuard();
installFetchGuard();

after(() => {
  while (restores.length > 0) {
    restores.pop()?.();
  }
});
