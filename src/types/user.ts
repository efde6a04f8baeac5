export type AuthUser = {
  uid: string;
  email: string | null;
  name: string | null;
};

/** Sessions are owned by the user's email, or by the uid when there is none. */
export function ownerOf(user: AuthUser): string {
  return user.email ?? user.uid;
}
