export type { HttpRequestOptions } from "./request";
export { RequestTimeoutError, UnsupportedProtocolError, httpRequest } from "./request";
