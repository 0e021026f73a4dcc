import axios, { type AxiosInstance } from 'axios';
import { API_URL, TIMEOUTS } from '../config';
import type { AssistantReply, HealthResponse, QueryResponse, SchemaResponse } from '../types/api';

export const createApiClient = (baseURL: string = API_URL): AxiosInstance =>
  axios.create({
    baseURL,
    headers: {
      'Content-Type': 'application/json',
    },
  });

const describeError = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      const { status, data } = error.response;
      const detail = typeof data === 'string' ? data : JSON.stringify(data);
      return `Backend error: ${status} - ${detail}`;
    }
    return `Connection error: ${error.message}`;
  }
  return `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
};

export const createChatService = (api: AxiosInstance) => ({
  /**
   * True when GET /health answers 2xx within the health timeout
   */
  async checkHealth(): Promise<boolean> {
    try {
      await api.get<HealthResponse>('/health', { timeout: TIMEOUTS.health });
      return true;
    } catch {
      return false;
    }
  },

  /**
   * Schema description for the sidebar. Failures come back as display text.
   */
  async getSchema(): Promise<string> {
    try {
      const response = await api.get<SchemaResponse>('/schema', { timeout: TIMEOUTS.schema });
      return response.data.schema;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        return 'Unable to fetch database schema';
      }
      return `Error fetching schema: ${error instanceof Error ? error.message : String(error)}`;
    }
  },

  /**
   * Ask a question. Never rejects: transport and HTTP failures are folded
   * into a failed QueryResponse.
   */
  async sendQuery(question: string): Promise<QueryResponse> {
    try {
      const response = await api.post<QueryResponse>('/query', { question }, { timeout: TIMEOUTS.query });
      return response.data;
    } catch (error) {
      return { success: false, result: null, sql_query: null, error: describeError(error) };
    }
  },
});

export type ChatService = ReturnType<typeof createChatService>;

export const chatService = createChatService(createApiClient());

export const toAssistantReply = (response: QueryResponse): AssistantReply => {
  const sql = response.sql_query ?? undefined;
  if (response.success) {
    return { content: response.result, sql };
  }
  return { content: `❌ ${response.error}`, sql, isError: true };
};
