import type { MessageId, UserId } from "@/db/types";
import type { BrowserState } from "./browser";

export interface BrowserSession {
  messageId: MessageId;
  /** Only this member may drive the browser. */
  invokerId: UserId;
  state: BrowserState;
}

/**
 * Live browser states keyed by the message that displays them.
 * The expiry timer scheduled with each session clears it.
 */
export class BrowserSessions {
  private readonly sessions = new Map<MessageId, BrowserSession>();

  store(session: BrowserSession): void {
    this.sessions.set(session.messageId, session);
  }

  get(messageId: MessageId): BrowserSession | undefined {
    return this.sessions.get(messageId);
  }

  clear(messageId: MessageId): void {
    this.sessions.delete(messageId);
  }
}
