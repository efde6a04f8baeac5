import mongoose from "mongoose";

export async function connectToDatabase(uri: string) {
  await mongoose.connect(uri);
  console.log("[db] connected to MongoDB");
  return mongoose.connection;
}

export async function disconnectDatabase(): Promise<void> {
  await mongoose.disconnect();
}
