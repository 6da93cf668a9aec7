/**
 * Chat-level types shared with the host's model client.
 */

export const MESSAGE_ROLES = ["system", "user", "assistant"] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export interface ChatMessage {
  role: MessageRole;
  content: string;
}
