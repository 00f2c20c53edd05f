/** Identity fields copied onto every record at the moment it is recorded. */
export type AuditFields = {
  readonly role?: string;
  readonly staffID?: string;
  readonly context?: string;
};

export interface AuditContextSource {
  snapshot(): AuditFields;
}

export type SessionIdentity = {
  role?: string;
  staffID?: string;
};

/**
 * Who is signed in. Written by the session/auth layer on login and logout;
 * recorders only read it. Writes are synchronous, so the event loop orders
 * them against `EventRecorder.record()`.
 */
export class SessionStore {
  private identity: SessionIdentity = {};

  login(identity: SessionIdentity) {
    this.identity = { role: identity.role, staffID: identity.staffID };
    return this;
  }

  logout() {
    this.identity = {};
    return this;
  }

  current(): Readonly<SessionIdentity> {
    return { ...this.identity };
  }
}

/** Process-wide session shared by every engine unless one is injected. */
export const session = new SessionStore();

/** Combines the shared session with a fixed component name. */
export class AuditContext implements AuditContextSource {
  constructor(
    readonly componentName: string,
    private readonly sessionStore: SessionStore = session
  ) {}

  snapshot(): AuditFields {
    const { role, staffID } = this.sessionStore.current();
    return Object.freeze({ role, staffID, context: this.componentName });
  }
}
