/**
 * Fetcher exports
 */
export { HttpFetcher, backoffDelayMs, DEFAULT_MAX_RETRIES, type HttpFetcherOptions, type PageFetcher } from './http.fetcher.js';
export { HttpSession, withHttpSession, type RequestResult, type RequestOptions } from './session.js';
export { USER_AGENTS, pickUserAgent, buildHeaders } from './user-agents.js';
