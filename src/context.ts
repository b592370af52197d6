export type AuthUser = {
  id: string;
  role: string;
};

export type Variables = {
  /** null for anonymous callers. */
  user: AuthUser | null;
};

export type AppEnv = { Variables: Variables };
