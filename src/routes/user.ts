import { asyncHandler } from "../middleware/errors.js";
import type { UserStore } from "../store/types.js";
import { ownerOf } from "../types/user.js";
import { AppError } from "../utils/errors.js";

export function createUserRoutes(users: UserStore) {
  const getMe = asyncHandler(async (req, res) => {
    if (!req.user) {
      throw new AppError("UNAUTHENTICATED", "getMe reached without a user");
    }
    const record = await users.find(req.user.uid);
    res.status(200).json({
      uid: req.user.uid,
      owner: ownerOf(req.user),
      email: record?.email ?? req.user.email,
      name: record?.name ?? req.user.name,
      createdAt: record?.createdAt ?? null,
      lastLoginAt: record?.lastLoginAt ?? null
    });
  });

  return { getMe };
}
