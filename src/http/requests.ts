/**
 * Request body helpers shared by the route modules.
 *
 * @module marquee/http/requests
 */

import type { Context } from "hono";
import { BadRequestError } from "../errors.ts";
import type { AppEnv } from "./routes.ts";

/**
 * Parse the body as JSON.
 *
 * @throws BadRequestError for an empty or badly-formed body
 */
export async function readJson(c: Context<AppEnv>): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === "") {
    throw new BadRequestError("body must not be empty");
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new BadRequestError("body contains badly-formed JSON");
  }
}
