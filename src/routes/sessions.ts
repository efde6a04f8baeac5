import { callerOf } from "../middleware/auth.js";
import { asyncHandler } from "../middleware/errors.js";
import type { SessionLifecycle } from "../sessions/lifecycle.js";

export function createSessionRoutes(lifecycle: SessionLifecycle) {
  const getSessions = asyncHandler(async (req, res) => {
    const sessions = await lifecycle.list(callerOf(req).owner);
    res.status(200).json({ sessions });
  });

  const postSession = asyncHandler(async (req, res) => {
    const sessionId = await lifecycle.create(callerOf(req).owner);
    res.status(201).json({ sessionId });
  });

  const getSession = asyncHandler(async (req, res) => {
    const session = await lifecycle.get(req.params.sessionId, callerOf(req).owner);
    res.status(200).json({ session });
  });

  const deleteSession = asyncHandler(async (req, res) => {
    await lifecycle.delete(req.params.sessionId, callerOf(req).owner);
    res.status(200).json({ deleted: true });
  });

  const switchSession = asyncHandler(async (req, res) => {
    const sessionId = await lifecycle.switch(req.params.sessionId, callerOf(req).owner);
    res.status(200).json({ sessionId });
  });

  return { getSessions, postSession, getSession, deleteSession, switchSession };
}
