/** The admin API could not be reached at all (refused, DNS failure, timeout). */
export class CaddyUnreachableError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Caddy admin API unreachable at ${url}: ${reason}`, { cause });
    this.name = "CaddyUnreachableError";
    this.url = url;
  }
}

/** The admin API answered, but with a non-2xx status. */
export class CaddyAdminError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(method: string, path: string, status: number, body: string) {
    super(`Caddy admin ${method} ${path} failed (${status}): ${body}`);
    this.name = "CaddyAdminError";
    this.status = status;
    this.body = body;
  }
}

/** The admin API answered 2xx with a body that is not a Caddy config. */
export class CaddyConfigShapeError extends Error {
  constructor(path: string) {
    super(`Caddy admin GET ${path} returned a document that is not a Caddy config`);
    this.name = "CaddyConfigShapeError";
  }
}
