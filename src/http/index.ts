export * from "./backoff";
export * from "./fetchWithRetry";
export * from "./httpSession";
export * from "./rateLimiter";
