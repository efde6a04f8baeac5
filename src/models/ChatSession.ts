import mongoose from "mongoose";
import { ChatTurnSchema, type ChatTurnRecord } from "./ChatTurn.js";

export type ChatSessionRecord = {
  sessionId: string;
  owner: string;
  createdAt: string;
  lastActivityAt: string;
  turns: ChatTurnRecord[];
};

const ChatSessionSchema = new mongoose.Schema<ChatSessionRecord>({
  sessionId: { type: String, required: true, index: true, unique: true },
  owner: { type: String, required: true, index: true },
  createdAt: { type: String, required: true },
  lastActivityAt: { type: String, required: true },
  turns: { type: [ChatTurnSchema], default: [] }
});

export const ChatSession = mongoose.model<ChatSessionRecord>(
  "ChatSession",
  ChatSessionSchema
);
