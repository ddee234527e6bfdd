/**
 * Mongoose-based implementation of UsageDb.
 *
 * Runs the rollup pipelines against the `messages`, `conversations` and
 * `users` collections. The connection opens lazily on first use; if it
 * cannot be opened the query rejects and the next collection cycle tries
 * again.
 */

import type { Connection } from "mongoose";
import type {
  CollectionTotals,
  DailyCount,
  ModelDailyCount,
  UserCount,
} from "@usage-exporter/shared";
import { openConnection, type MongoOptions } from "../db/index.js";
import { conversationSchema, messageSchema, userSchema } from "../db/schema.js";
import {
  messagesPerModelPerDayPipeline,
  messagesPerUserPipeline,
  newUsersPerDayPipeline,
  uniqueUsersPerDayPipeline,
} from "./pipelines.js";
import type { QueryOptions, UsageDb } from "./usage-collector.js";

function bindModels(conn: Connection) {
  return {
    conn,
    Message: conn.model("Message", messageSchema),
    Conversation: conn.model("Conversation", conversationSchema),
    User: conn.model("User", userSchema),
  };
}

type Handle = ReturnType<typeof bindModels>;

export class MongoUsageDb implements UsageDb {
  private handle: Handle | null = null;
  private connecting: Promise<Handle> | null = null;

  constructor(private options: MongoOptions) {}

  async uniqueUsersPerDay(opts: QueryOptions): Promise<DailyCount[]> {
    const { Message } = await this.connect();
    return Message.aggregate<DailyCount>(uniqueUsersPerDayPipeline(opts)).exec();
  }

  async messagesPerUser(opts: QueryOptions): Promise<UserCount[]> {
    const { Message } = await this.connect();
    return Message.aggregate<UserCount>(messagesPerUserPipeline(opts)).exec();
  }

  async messagesPerModelPerDay(opts: QueryOptions): Promise<ModelDailyCount[]> {
    const { Message } = await this.connect();
    return Message.aggregate<ModelDailyCount>(messagesPerModelPerDayPipeline(opts)).exec();
  }

  async newUsersPerDay(opts: QueryOptions): Promise<DailyCount[]> {
    const { User } = await this.connect();
    return User.aggregate<DailyCount>(newUsersPerDayPipeline(opts)).exec();
  }

  async totals(opts: QueryOptions): Promise<CollectionTotals> {
    const { User, Conversation, Message } = await this.connect();
    const filter = opts.since ? { createdAt: { $gte: opts.since } } : {};
    const [users, conversations, messages] = await Promise.all([
      User.countDocuments(filter).exec(),
      Conversation.countDocuments(filter).exec(),
      Message.countDocuments(filter).exec(),
    ]);
    return { users, conversations, messages };
  }

  async ping(): Promise<void> {
    const { conn } = await this.connect();
    await conn.db?.admin().ping();
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) await handle.conn.close();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async connect(): Promise<Handle> {
    if (this.handle) return this.handle;
    this.connecting ??= openConnection(this.options)
      .then(bindModels)
      .finally(() => {
        this.connecting = null;
      });
    this.handle = await this.connecting;
    return this.handle;
  }
}
