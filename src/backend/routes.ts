/** Backend services and the path prefix each one is mounted under. */
export const SERVICE_PATHS = {
  "askme-manager": "api/askme-manager",
  "ai-engine": "api/ai-engine/mcp",
} as const;

export type BackendService = keyof typeof SERVICE_PATHS;

/** Client-credentials login endpoint, relative to the backend base URL. */
export const LOGIN_PATH = "api/secure/client/user-login";

export type HttpMethod = "GET" | "POST";

/** How the dispatcher should expose a successful response body. */
export type ResponseType = "json" | "stream";

/** Backend call derived from a validated tool input. */
export interface BackendRoute {
  readonly method: HttpMethod;
  readonly service: BackendService;
  /** Endpoint below the service prefix, dynamic segments included (`metadata/get/42`). */
  readonly endpoint: string;
  readonly payload?: Readonly<Record<string, unknown>>;
  readonly responseType: ResponseType;
}

/** Relative path (no leading slash) of {@link route}. */
export function resolveRoutePath(route: Pick<BackendRoute, "service" | "endpoint">): string {
  const endpoint = route.endpoint.replace(/^\/+/, "");
  return `${SERVICE_PATHS[route.service]}/${endpoint}`;
}

/**
 * Joins {@link path} onto {@link baseUrl}, keeping any path prefix the base URL
 * already carries (`https://host/tenant` + `api/x` → `https://host/tenant/api/x`).
 */
export function buildBackendUrl(baseUrl: string, path: string): URL {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  return new URL(path.replace(/^\/+/, ""), base);
}
