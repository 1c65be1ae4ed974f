export { apiKeys } from "./api-keys.js";
export { predictionLogs } from "./prediction-logs.js";
export { rateLimitEntries } from "./rate-limit-entries.js";
