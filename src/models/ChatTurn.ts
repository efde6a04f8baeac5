import mongoose from "mongoose";

export type ChatTurnRecord = {
  role: "user" | "assistant";
  content: string;
  timestamp: string;
};

export const ChatTurnSchema = new mongoose.Schema<ChatTurnRecord>(
  {
    role: { type: String, enum: ["user", "assistant"], required: true },
    content: { type: String, required: true },
    timestamp: { type: String, required: true }
  },
  { _id: false }
);
