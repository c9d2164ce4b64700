export { Logger } from './logger.js';
export { HttpClient, type HttpResponse, type HttpClientOptions } from './http-client.js';
export * from './errors.js';
