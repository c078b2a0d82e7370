export * from "./browserSession";
export * from "./portalPage";
export * from "./retryPolicy";
export * from "./statusFetcher";
