/**
 * Request ID middleware.
 *
 * Tags every devnet call with an X-Request-Id that the access log
 * carries. A caller-supplied ID is kept when it is a short token
 * (letters, digits, `.`, `_`, `:`, `-`, at most 128 characters), so a
 * keeper can line its own logs up with the node's; anything else is
 * replaced with a fresh UUID.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId = incoming !== undefined && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();

    c.set("requestId", requestId);
    await next();
    c.header(REQUEST_ID_HEADER, requestId);
  };
}
