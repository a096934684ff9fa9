import { randomUUID } from "node:crypto";
import { getSignedCookie, setSignedCookie } from "hono/cookie";
import { createMiddleware } from "hono/factory";

export const SESSION_COOKIE = "reframer_uid";
const SESSION_MAX_AGE_SECONDS = 30 * 24 * 60 * 60;
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type SessionEnv = {
  Variables: {
    user_id: string;
  };
};

/**
 * Anonymous identity. The user id lives in a cookie signed with the app
 * secret; a missing or tampered cookie starts a new identity.
 */
export function userSession(secret: string) {
  return createMiddleware<SessionEnv>(async (c, next) => {
    const current = await getSignedCookie(c, secret, SESSION_COOKIE);
    let user_id = typeof current === "string" && UUID.test(current) ? current : null;

    if (!user_id) {
      user_id = randomUUID();
      await setSignedCookie(c, SESSION_COOKIE, user_id, secret, {
        path: "/",
        httpOnly: true,
        sameSite: "Lax",
        maxAge: SESSION_MAX_AGE_SECONDS,
      });
    }

    c.set("user_id", user_id);
    await next();
  });
}
