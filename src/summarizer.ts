// Transcript Relay - Session summarization
//
// Flattens a session's stored transcript and hands it to an external text model
// when one is configured. Every failure path ends in the local bullet heuristic,
// so a summary is always produced and summarizer errors never reach the client.

import type OpenAI from "openai";
import { describeError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { SessionStore } from "./session-store.js";
import type { SummaryResponse, SummaryResult, TranscriptMessage } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const NO_TRANSCRIPT_SUMMARY = "No transcript available to summarize.";

export const DEFAULT_SUMMARIZER_MODEL = "gpt-4o-mini";

/** Local heuristic keeps at most this many lines... */
const MAX_LOCAL_BULLETS = 12;

/** ...and skips lines longer than this. */
const MAX_LOCAL_BULLET_LENGTH = 200;

const SUMMARY_SYSTEM_PROMPT =
  "You are a concise meeting summarizer. Summarize the transcript into 6-10 clear bullet points, " +
  "group related ideas, and highlight decisions and action items. Keep bullets short.";

// ─── Transcript flattening ──────────────────────────────────────────────────────

/**
 * One line per stored message, in stored order. Messages with a speaker are
 * prefixed `[speaker] `; messages with empty text are skipped.
 */
export function flattenTranscript(messages: readonly TranscriptMessage[]): string {
  const lines: string[] = [];
  for (const message of messages) {
    if (!message.text) {
      continue;
    }
    lines.push(message.speaker ? `[${message.speaker}] ${message.text}` : message.text);
  }
  return lines.join("\n");
}

// ─── Local fallback ─────────────────────────────────────────────────────────────

/**
 * Bullet-list heuristic: the first non-blank lines of at most 200 characters,
 * up to 12 of them, each prefixed with "• ".
 */
export function localSummarize(transcript: string): string {
  const bullets: string[] = [];
  for (const raw of transcript.split("\n")) {
    const line = raw.trim();
    if (!line || line.length > MAX_LOCAL_BULLET_LENGTH) {
      continue;
    }
    bullets.push(line);
    if (bullets.length >= MAX_LOCAL_BULLETS) {
      break;
    }
  }
  if (bullets.length === 0) {
    return NO_TRANSCRIPT_SUMMARY;
  }
  return bullets.map((b) => `• ${b}`).join("\n");
}

// ─── External summarizer ────────────────────────────────────────────────────────

/**
 * Minimal chat-completion surface used for summaries. Keeps the OpenAI SDK out of
 * the summarizer's tests.
 */
export interface ChatCompletionPort {
  complete(request: { model: string; system: string; user: string }): Promise<string | null>;
}

/** Adapts the OpenAI SDK client to ChatCompletionPort. */
export function openAIChatPort(client: OpenAI): ChatCompletionPort {
  return {
    async complete({ model, system, user }) {
      const response = await client.chat.completions.create({
        model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
        temperature: 0.3,
      });
      return response.choices[0]?.message?.content ?? null;
    },
  };
}

export interface ExternalSummarizer {
  /** Returns non-empty summary text, or throws. */
  summarize(transcript: string): Promise<string>;
}

export class OpenAISummarizer implements ExternalSummarizer {
  private readonly chat: ChatCompletionPort;
  private readonly model: string;

  constructor(chat: ChatCompletionPort, model: string = DEFAULT_SUMMARIZER_MODEL) {
    this.chat = chat;
    this.model = model;
  }

  async summarize(transcript: string): Promise<string> {
    const content = await this.chat.complete({
      model: this.model,
      system: SUMMARY_SYSTEM_PROMPT,
      user: `Transcript:\n\n${transcript}`,
    });
    const text = content?.trim();
    if (!text) {
      throw new Error("Summarizer returned empty response");
    }
    return text;
  }
}

// ─── Session summarizer ─────────────────────────────────────────────────────────

export interface SessionSummarizerDeps {
  store: SessionStore;
  /** Omit (or null) to always use the local heuristic. */
  external?: ExternalSummarizer | null;
  logger?: Logger;
}

export class SessionSummarizer {
  private readonly store: SessionStore;
  private readonly external: ExternalSummarizer | null;
  private readonly logger: Logger;

  constructor(deps: SessionSummarizerDeps) {
    this.store = deps.store;
    this.external = deps.external ?? null;
    this.logger = deps.logger ?? createConsoleLogger("Summarizer");
  }

  get hasExternal(): boolean {
    return this.external !== null;
  }

  async summarizeSession(sessionId: string): Promise<SummaryResponse> {
    const transcript = flattenTranscript(this.store.readAll(sessionId));
    const result = await this.summarizeTranscript(transcript);
    return { sessionId, ...result };
  }

  async summarizeTranscript(transcript: string): Promise<SummaryResult> {
    if (!transcript.trim()) {
      return { summary: NO_TRANSCRIPT_SUMMARY, source: "local" };
    }
    if (!this.external) {
      return { summary: localSummarize(transcript), source: "local" };
    }

    try {
      const summary = await this.external.summarize(transcript);
      if (summary.trim()) {
        return { summary, source: "external" };
      }
      this.logger.warn("External summarizer returned empty text, using local summary");
    } catch (err) {
      this.logger.warn(`External summarizer failed, using local summary: ${describeError(err)}`);
    }
    return { summary: localSummarize(transcript), source: "local" };
  }
}
