/**
 * Response helpers shared by the middlewares and the router.
 *
 * @module marquee/http/responses
 */

/**
 * Build a JSON response.
 */
export function jsonResponse(
  payload: unknown,
  status = 200,
  headers?: Record<string, string>,
): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: {
      "Content-Type": "application/json",
      ...(headers ?? {}),
    },
  });
}

/**
 * Merge headers collected on the request context into the final response.
 *
 * `Vary` tokens are unioned with whatever the handler set; any other header
 * is only added when the response does not carry it already.
 */
export function applyResponseHeaders(
  response: Response,
  extra: Headers,
): Response {
  const headers = new Headers(response.headers);

  extra.forEach((value, name) => {
    if (name === "vary") {
      headers.set("vary", mergeVary(headers.get("vary"), value));
    } else if (!headers.has(name)) {
      headers.set(name, value);
    }
  });

  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}

function mergeVary(existing: string | null, added: string): string {
  const tokens: string[] = [];
  for (const raw of `${existing ?? ""},${added}`.split(",")) {
    const token = raw.trim();
    if (
      token &&
      !tokens.some((t) => t.toLowerCase() === token.toLowerCase())
    ) {
      tokens.push(token);
    }
  }
  return tokens.join(", ");
}
