import { inspect } from "node:util";

/**
 * Client id/secret pair used for the client-credentials exchange. The pair is
 * fixed for the lifetime of the process; the secret lives in a private field
 * and every serialisation path renders it redacted.
 */
export class CredentialStore {
  readonly clientId: string;
  readonly #secret: string;

  constructor(clientId: string, secret: string) {
    this.clientId = clientId;
    this.#secret = secret;
    Object.freeze(this);
  }

  /** Body expected by the backend login endpoint. */
  toLoginPayload(): { data: { clientId: string; secret: string } } {
    return { data: { clientId: this.clientId, secret: this.#secret } };
  }

  toJSON(): { clientId: string; secret: string } {
    return { clientId: this.clientId, secret: "[REDACTED]" };
  }

  [inspect.custom](): string {
    return `CredentialStore { clientId: ${JSON.stringify(this.clientId)}, secret: [REDACTED] }`;
  }
}
