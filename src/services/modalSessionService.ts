import type { IFieldSpec } from "./issueFormTypes.js";

export interface IModalSession {
  sessionKey: string;
  command: string;
  channelId: string;
  userId: string;
  title: string;
  /** Page order; fixed for the lifetime of the session. */
  orderedFields: readonly IFieldSpec[];
  /** Keyed by display label. */
  collectedValues: Map<string, string>;
  labels: readonly string[];
  targetOwner: string;
  targetRepo: string;
}

const KEY_SEPARATOR = "_";
const FORM_PREFIX = "modal";
const CONTINUE_PREFIX = "continue";

export const CONTINUE_BUTTON_PREFIX = `${CONTINUE_PREFIX}${KEY_SEPARATOR}`;
export const FORM_ID_REGEX = /^modal_/;
export const CONTINUE_BUTTON_REGEX = /^continue_/;

export const buildSessionKey = (command: string, channelId: string, userId: string): string => {
  return [command, channelId, userId].join(KEY_SEPARATOR);
};

export const buildFormId = (command: string, channelId: string): string => {
  return [FORM_PREFIX, command, channelId].join(KEY_SEPARATOR);
};

export const buildContinuationFormId = (sessionKey: string): string => {
  return [FORM_PREFIX, CONTINUE_PREFIX, sessionKey].join(KEY_SEPARATOR);
};

export const buildContinueButtonId = (sessionKey: string): string => {
  return `${CONTINUE_BUTTON_PREFIX}${sessionKey}`;
};

export const parseContinueButtonId = (customId: string): string | null => {
  if (!customId.startsWith(CONTINUE_BUTTON_PREFIX)) return null;
  return customId.slice(CONTINUE_BUTTON_PREFIX.length);
};

export type FormIdRoute =
  | { kind: "continuation"; sessionKey: string }
  | { kind: "command"; command: string };

/** `null` for ids that do not follow `modal_<command>_...` or `modal_continue_<key>`. */
export const parseFormId = (customId: string): FormIdRoute | null => {
  const parts = customId.split(KEY_SEPARATOR);
  if (parts.length < 2) return null;

  const [, second] = parts;
  if (second === CONTINUE_PREFIX) {
    return { kind: "continuation", sessionKey: parts.slice(2).join(KEY_SEPARATOR) };
  }
  if (!second) return null;
  return { kind: "command", command: second };
};

/**
 * In-memory registry of multi-page form submissions, one per session key.
 * Map operations run to completion on the event loop, so concurrent
 * interactions for different keys never observe a partial update.
 */
export class ModalSessionStore {
  private readonly sessions = new Map<string, IModalSession>();

  get size(): number {
    return this.sessions.size;
  }

  /** Replaces any session already stored under the key. */
  create(sessionKey: string, session: IModalSession): void {
    this.sessions.set(sessionKey, session);
  }

  get(sessionKey: string): IModalSession | null {
    return this.sessions.get(sessionKey) ?? null;
  }

  delete(sessionKey: string): boolean {
    return this.sessions.delete(sessionKey);
  }
}
