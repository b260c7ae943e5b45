export { SyncthingClient, apiBaseUrl, createDispatcher, findTlsError, ENDPOINTS } from "./client.js";
export type { SyncthingClientOptions, FetchLike, HttpMethod, HttpRequest, HttpResponse } from "./client.js";
export { readApiKey, parseApiKey, waitForApiKey, configXmlPath } from "./credential.js";
export type { ApiKeyResult, WaitForApiKeyOptions } from "./credential.js";
export { CredentialTimeoutError, TransportError, RestartTriggerError } from "./errors.js";
