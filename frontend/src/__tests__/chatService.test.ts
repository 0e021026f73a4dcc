import { describe, it, expect } from 'vitest';
import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { createChatService, toAssistantReply } from '../services/chatService';

type Handler = (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>;

const respond = (config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse => ({
  data,
  status,
  statusText: String(status),
  headers: {},
  config,
});

const fail = (config: InternalAxiosRequestConfig, status: number, data: unknown) =>
  Promise.reject(
    new AxiosError(
      `Request failed with status code ${status}`,
      AxiosError.ERR_BAD_RESPONSE,
      config,
      undefined,
      respond(config, status, data)
    )
  );

const refuse = (config: InternalAxiosRequestConfig) =>
  Promise.reject(new AxiosError('connect ECONNREFUSED 127.0.0.1:8000', 'ECONNREFUSED', config));

// In-process stand-in for the HTTP transport
const serviceWith = (handler: Handler) =>
  createChatService(axios.create({ baseURL: 'http://api.test', adapter: handler }));

describe('chatService', () => {
  describe('checkHealth', () => {
    it('is true when /health answers', async () => {
      const seen: InternalAxiosRequestConfig[] = [];
      const service = serviceWith(async (config) => {
        seen.push(config);
        return respond(config, 200, { status: 'healthy' });
      });

      expect(await service.checkHealth()).toBe(true);
      expect(seen[0].url).toBe('/health');
      expect(seen[0].timeout).toBe(5000);
    });

    it('is false when the backend is unreachable', async () => {
      expect(await serviceWith(refuse).checkHealth()).toBe(false);
    });
  });

  describe('getSchema', () => {
    it('returns the schema text', async () => {
      const service = serviceWith(async (config) => respond(config, 200, { schema: 'Database Schema: ...' }));

      expect(await service.getSchema()).toBe('Database Schema: ...');
    });

    it('reports a non-2xx answer', async () => {
      const service = serviceWith((config) => fail(config, 503, 'Service Unavailable'));

      expect(await service.getSchema()).toBe('Unable to fetch database schema');
    });

    it('reports a connection failure', async () => {
      expect(await serviceWith(refuse).getSchema()).toBe(
        'Error fetching schema: connect ECONNREFUSED 127.0.0.1:8000'
      );
    });
  });

  describe('sendQuery', () => {
    it('posts the question and returns the response body', async () => {
      const seen: InternalAxiosRequestConfig[] = [];
      const body = { success: true, result: 'The result is: 3', sql_query: 'SELECT COUNT(*) FROM customers;', error: null };
      const service = serviceWith(async (config) => {
        seen.push(config);
        return respond(config, 200, body);
      });

      expect(await service.sendQuery('How many customers?')).toEqual(body);
      expect(seen[0].method).toBe('post');
      expect(seen[0].url).toBe('/query');
      expect(seen[0].timeout).toBe(30000);
      expect(JSON.parse(String(seen[0].data))).toEqual({ question: 'How many customers?' });
    });

    it('folds a backend error into a failed response', async () => {
      const service = serviceWith((config) =>
        fail(config, 500, { error: 'Internal server error: Gemini request failed: timeout', statusCode: 500 })
      );

      expect(await service.sendQuery('How many customers?')).toEqual({
        success: false,
        result: null,
        sql_query: null,
        error:
          'Backend error: 500 - {"error":"Internal server error: Gemini request failed: timeout","statusCode":500}',
      });
    });

    it('keeps a plain-text error body as is', async () => {
      const service = serviceWith((config) => fail(config, 502, 'Bad Gateway'));

      const response = await service.sendQuery('How many customers?');

      expect(response.error).toBe('Backend error: 502 - Bad Gateway');
    });

    it('folds a connection failure into a failed response', async () => {
      const response = await serviceWith(refuse).sendQuery('How many customers?');

      expect(response.success).toBe(false);
      expect(response.error).toBe('Connection error: connect ECONNREFUSED 127.0.0.1:8000');
    });
  });
});

describe('toAssistantReply', () => {
  it('shows the result with its SQL', () => {
    expect(
      toAssistantReply({
        success: true,
        result: 'Here are the results:\n\nLia, Moreira',
        sql_query: "SELECT FirstName, LastName FROM customers WHERE Country = 'Brazil';",
        error: null,
      })
    ).toEqual({
      content: 'Here are the results:\n\nLia, Moreira',
      sql: "SELECT FirstName, LastName FROM customers WHERE Country = 'Brazil';",
    });
  });

  it('marks failures as errors and keeps the SQL', () => {
    expect(
      toAssistantReply({
        success: false,
        result: null,
        sql_query: 'SELECT Nickname FROM customers;',
        error: 'SQL execution error: no such column: Nickname',
      })
    ).toEqual({
      content: '❌ SQL execution error: no such column: Nickname',
      sql: 'SELECT Nickname FROM customers;',
      isError: true,
    });
  });

  it('omits the SQL when none was produced', () => {
    expect(
      toAssistantReply({ success: false, result: null, sql_query: null, error: 'Connection error: Network Error' })
    ).toEqual({ content: '❌ Connection error: Network Error', sql: undefined, isError: true });
  });
});
