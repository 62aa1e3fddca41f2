// Body written for every failed request.
export interface HttpExceptionResponse {
  statusCode: number;
  error: string;
  timestamp: string;
  path: string;
}
