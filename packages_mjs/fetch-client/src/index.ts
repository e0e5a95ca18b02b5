/**
 * fetch-session - composable HTTP requests and cookie-keeping sessions
 */

export * from "./types.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./response.js";
export * from "./session.js";
export * from "./client.js";
export * from "./core/options.js";
export * from "./core/prepare.js";
export * from "./core/request.js";
export * from "./core/url.js";
export * from "./core/redirect.js";
export { encodeBody, encodeJson, encodeMultipart } from "./core/body.js";
export type { EncodedBody } from "./core/body.js";
export { UndiciHttpClient } from "./core/base-client.js";
export type { UndiciHttpClientOptions } from "./core/base-client.js";
export * from "./cookies/jar.js";
