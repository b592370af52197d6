import { sign, verify } from "hono/jwt";

let SECRET_KEY: string | null = null;

export const setJwtSecret = (secret: string) => {
  SECRET_KEY = secret;
};

export const isJwtConfigured = (): boolean => SECRET_KEY !== null;

const getSecret = (): string => {
  if (!SECRET_KEY) {
    throw new Error("JWT secret not set. Call setJwtSecret() first.");
  }
  return SECRET_KEY;
};

export const generateAccessToken = async (userId: string, role: string = "USER") => {
  const payload = {
    sub: userId,
    role: role,
    exp: Math.floor(Date.now() / 1000) + 60 * 15, // 15 minutes
  };
  return await sign(payload, getSecret());
};

export const verifyJwt = async (token: string) => {
  try {
    return await verify(token, getSecret());
  } catch (_) {
    return null;
  }
};
