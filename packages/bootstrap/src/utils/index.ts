export { fetchWithTimeout } from "./fetch-with-timeout.js";
export { formatError } from "./format-error.js";
