import jwt from "jsonwebtoken";

export interface JwtPayload {
  userId: string;
  roles: string[];
}

export function signAccessToken(
  payload: JwtPayload,
  secret: string,
  expiresInSeconds: number,
): string {
  return jwt.sign({ userId: payload.userId, roles: payload.roles }, secret, {
    expiresIn: expiresInSeconds,
  });
}

// Throws on bad signature, expiry, or a payload of the wrong shape.
export function verifyAccessToken(token: string, secret: string): JwtPayload {
  const decoded = jwt.verify(token, secret);

  if (typeof decoded === "string") {
    throw new Error("Unexpected string payload");
  }

  const { userId, roles } = decoded;

  if (typeof userId !== "string" || !Array.isArray(roles)) {
    throw new Error("Malformed token payload");
  }

  return {
    userId,
    roles: roles.filter((role): role is string => typeof role === "string"),
  };
}
