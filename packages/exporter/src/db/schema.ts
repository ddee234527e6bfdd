import { Schema } from "mongoose";

/**
 * Read-side views of the chat application's collections. Only the fields
 * the rollups touch are declared; `strict: false` keeps the rest of each
 * document intact on the rare occasion one is hydrated.
 */

export const messageSchema = new Schema(
  {
    messageId: { type: String, index: true },
    conversationId: { type: String, index: true },
    user: { type: String, index: true },
    model: { type: String, default: null },
    endpoint: String,
    sender: String,
    isCreatedByUser: Boolean,
  },
  { collection: "messages", timestamps: true, strict: false },
);

export const conversationSchema = new Schema(
  {
    conversationId: { type: String, index: true },
    user: { type: String, index: true },
    title: String,
    model: { type: String, default: null },
    endpoint: String,
  },
  { collection: "conversations", timestamps: true, strict: false },
);

export const userSchema = new Schema(
  {
    email: String,
    username: String,
  },
  { collection: "users", timestamps: true, strict: false },
);
