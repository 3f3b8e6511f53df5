// Transcript Relay - Session Lifecycle Manager
// Creates one Relay Session per accepted client connection and tears it down when
// either side ends. Each Relay Session gets its own upstream client instance.

import { v4 as uuidv4 } from "uuid";
import type { ClientChannel } from "./client-channel.js";
import { describeError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { RelaySession } from "./relay-session.js";
import type { SessionStore } from "./session-store.js";
import type { RelayState } from "./types.js";
import type { UpstreamConnector } from "./upstream-client.js";

export interface SessionLifecycleDeps {
  store: SessionStore;
  /** Builds the upstream client for a new Relay Session. */
  upstreamFactory: (sessionId: string) => UpstreamConnector;
  logger?: Logger;
  /** Passed through to every Relay Session (tests shorten these). */
  backoffMs?: number;
  retryDelayMs?: number;
  onStateChange?: (connectionId: string, state: RelayState, previous: RelayState) => void;
}

interface LiveSession {
  session: RelaySession;
  done: Promise<void>;
}

export class SessionLifecycleManager {
  private readonly deps: SessionLifecycleDeps;
  private readonly logger: Logger;
  private live: Map<string, LiveSession> = new Map();

  constructor(deps: SessionLifecycleDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createConsoleLogger("Lifecycle");
  }

  /**
   * Starts a Relay Session for the client. The returned promise resolves once the
   * session has terminated and both connections are closed; it never rejects.
   */
  accept(sessionId: string, client: ClientChannel): Promise<void> {
    const connectionId = uuidv4();
    const { onStateChange } = this.deps;
    const session = new RelaySession({
      sessionId,
      connectionId,
      client,
      upstream: this.deps.upstreamFactory(sessionId),
      store: this.deps.store,
      logger: this.deps.logger,
      backoffMs: this.deps.backoffMs,
      retryDelayMs: this.deps.retryDelayMs,
      onStateChange: onStateChange
        ? (state, previous) => onStateChange(connectionId, state, previous)
        : undefined,
    });

    this.logger.info(`Accepted connection ${connectionId} for session ${sessionId} (${this.live.size + 1} live)`);

    const done = session
      .run()
      .catch((err) => {
        this.logger.error(`Relay session ${connectionId} failed: ${describeError(err)}`);
        return session.terminate();
      })
      .finally(() => {
        this.live.delete(connectionId);
        this.logger.info(`Released connection ${connectionId} (${this.live.size} live)`);
      });

    this.live.set(connectionId, { session, done });
    return done;
  }

  get activeCount(): number {
    return this.live.size;
  }

  /** Session identifiers of the live Relay Sessions, one entry per connection. */
  activeSessionIds(): string[] {
    return [...this.live.values()].map(({ session }) => session.sessionId);
  }

  /** Terminates every live Relay Session and waits for their teardown. */
  async shutdown(): Promise<void> {
    const sessions = [...this.live.values()];
    await Promise.allSettled(sessions.map(({ session, done }) => Promise.all([session.terminate(), done])));
  }
}
