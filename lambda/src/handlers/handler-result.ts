/**
 * Response produced by a route handler; the entry point adds CORS headers
 */
export interface HandlerResult {
  statusCode: number;
  body: string;
  headers?: Record<string, string>;
}
