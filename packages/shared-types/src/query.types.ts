// Query Service wire types

export interface QueryRequest {
  question: string;
}

export interface QuerySuccessResponse {
  success: true;
  result: string;
  sql_query: string;
  error: null;
}

export interface QueryFailureResponse {
  success: false;
  result: null;
  sql_query: string | null;
  error: string;
}

export type QueryResponse = QuerySuccessResponse | QueryFailureResponse;

export interface SchemaResponse {
  schema: string;
}

export interface RootResponse {
  message: string;
  status: 'healthy';
}

export interface HealthResponse {
  status: 'healthy';
  service: string;
  timestamp: string;
}

export interface DetailedHealthResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  checks: {
    database: boolean;
    model: boolean;
    langfuse: boolean;
  };
}

export interface ApiErrorResponse {
  error: string;
  statusCode?: number;
  details?: unknown;
}
