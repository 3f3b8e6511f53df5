// Transcript Relay - Session Store
// Process-lifetime map from session identifier to its ordered transcript messages.
//
// Sessions are never deleted. Several Relay Sessions may share an identifier and
// append concurrently; each append is a single synchronous push on the event loop,
// so no append can interleave with another or with a snapshot read.

import type { TranscriptMessage } from "./types.js";

export class SessionStore {
  private sessions: Map<string, TranscriptMessage[]> = new Map();

  /** Registers the session if it is not known yet. Returns true when it was created. */
  ensure(sessionId: string): boolean {
    if (this.sessions.has(sessionId)) {
      return false;
    }
    this.sessions.set(sessionId, []);
    return true;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Appends a message to the session's sequence, creating the session if absent.
   * The stored message is a frozen copy, so later mutation by the caller has no effect.
   */
  append(sessionId: string, message: TranscriptMessage): void {
    let messages = this.sessions.get(sessionId);
    if (!messages) {
      messages = [];
      this.sessions.set(sessionId, messages);
    }
    const stored: TranscriptMessage =
      message.speaker === undefined
        ? { text: message.text, isFinal: message.isFinal }
        : { text: message.text, isFinal: message.isFinal, speaker: message.speaker };
    messages.push(Object.freeze(stored));
  }

  /** Snapshot of the session's messages in append order; empty for an unknown session. */
  readAll(sessionId: string): TranscriptMessage[] {
    const messages = this.sessions.get(sessionId);
    return messages ? [...messages] : [];
  }

  get sessionCount(): number {
    return this.sessions.size;
  }
}
