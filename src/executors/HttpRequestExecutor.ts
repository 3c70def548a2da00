/** Executes request descriptors on a worker's axios session */
import axios, { type AxiosResponse } from 'axios';
import {
  ExtractionError,
  type FetchError,
  HttpStatusError,
  TimeoutError,
  TransportError,
  toErrorMessage,
} from '../errors.js';
import type { HttpSession } from '../clients/HttpClientFactory.js';
import type { RequestDescriptor, Task, WorkItem } from '../types.js';
import { urlOf } from '../types.js';
import { fail, succeed, type ExecutionOutcome, type TaskExecutor } from './TaskExecutor.js';

export interface HttpPayload {
  url: string;
  status: number;
  headers: Record<string, string>;
  data: unknown;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export function classifyHttpError(error: unknown, url: string): FetchError {
  if (axios.isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new TimeoutError(`Request to ${url} timed out: ${error.message}`, { cause: error });
    }
    return new TransportError(`Request to ${url} failed: ${error.message}`, { cause: error });
  }
  return new TransportError(`Request to ${url} failed: ${toErrorMessage(error)}`, { cause: error });
}

export function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') out[key.toLowerCase()] = value;
    else if (typeof value === 'number' || typeof value === 'boolean') out[key.toLowerCase()] = String(value);
    else if (Array.isArray(value)) out[key.toLowerCase()] = value.join(', ');
  }
  return out;
}

export class HttpRequestExecutor implements TaskExecutor<HttpSession, WorkItem, HttpPayload> {
  async execute(session: HttpSession, task: Task): Promise<ExecutionOutcome<HttpPayload>> {
    const item = task.item;
    const url = urlOf(item);
    const descriptor: RequestDescriptor = typeof item === 'string' ? { url } : item;

    let response: AxiosResponse<string>;
    try {
      response = await session.http.request<string>({
        url,
        method: descriptor.method ?? 'GET',
        params: descriptor.params,
        headers: descriptor.headers,
        data: descriptor.data,
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
    } catch (error) {
      return fail(classifyHttpError(error, url));
    }

    if (response.status < 200 || response.status >= 300) {
      return fail(new HttpStatusError(response.status, url));
    }

    const headers = flattenHeaders(response.headers);
    let data: unknown = response.data;
    if ((headers['content-type'] ?? '').includes('application/json')) {
      // HEAD and 204 responses carry the header without a body
      if (!response.data?.trim()) return succeed({ url, status: response.status, headers, data: null });
      try {
        data = JSON.parse(response.data);
      } catch (error) {
        return fail(new ExtractionError(`Invalid JSON from ${url}: ${toErrorMessage(error)}`, { cause: error }));
      }
    }

    return succeed({ url, status: response.status, headers, data });
  }
}
