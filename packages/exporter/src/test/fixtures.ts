import type { UsageFixture } from "./in-memory-usage-db.js";

/**
 * Three days of chat traffic (UTC):
 *  - 2025-03-01: u1 ×2 (gpt-4o), u2 ×1 (claude)
 *  - 2025-03-02: u2 ×1 (no model), u3 ×1 (gpt-4o)
 *  - 2025-03-03: u1 ×1 (gpt-4o), one message with no user (gpt-4o)
 */
export function sampleFixture(): UsageFixture {
  const at = (iso: string) => new Date(iso);
  return {
    messages: [
      { conversationId: "c1", user: "u1", model: "gpt-4o", createdAt: at("2025-03-01T09:00:00Z") },
      { conversationId: "c1", user: "u1", model: "gpt-4o", createdAt: at("2025-03-01T10:00:00Z") },
      { conversationId: "c2", user: "u2", model: "claude", createdAt: at("2025-03-01T23:30:00Z") },
      { conversationId: "c2", user: "u2", model: null, createdAt: at("2025-03-02T08:00:00Z") },
      { conversationId: "c3", user: "u3", model: "gpt-4o", createdAt: at("2025-03-02T12:00:00Z") },
      { conversationId: "c1", user: "u1", model: "gpt-4o", createdAt: at("2025-03-03T00:15:00Z") },
      { conversationId: "c4", user: null, model: "gpt-4o", createdAt: at("2025-03-03T01:00:00Z") },
    ],
    conversations: [
      { conversationId: "c1", user: "u1", createdAt: at("2025-03-01T09:00:00Z") },
      { conversationId: "c2", user: "u2", createdAt: at("2025-03-01T23:30:00Z") },
      { conversationId: "c3", user: "u3", createdAt: at("2025-03-02T12:00:00Z") },
      { conversationId: "c4", user: "u4", createdAt: at("2025-03-03T01:00:00Z") },
    ],
    users: [
      { createdAt: at("2025-02-28T10:00:00Z") },
      { createdAt: at("2025-03-01T11:00:00Z") },
      { createdAt: at("2025-03-01T12:00:00Z") },
    ],
  };
}
