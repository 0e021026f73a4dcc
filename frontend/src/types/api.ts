export type {
  ChatMessage,
  ChatRole,
  ChatSessionStatus,
  QueryRequest,
  QueryResponse,
  SchemaResponse,
  HealthResponse,
} from '@text2sql/shared-types';

/** Assistant turn as produced from a query response, before it gets an id. */
export interface AssistantReply {
  content: string;
  sql?: string;
  isError?: boolean;
}

export type BackendStatus = 'checking' | 'connected' | 'disconnected';
