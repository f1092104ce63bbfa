import type { AxiosAdapter, AxiosResponse } from 'axios';

export interface StubReply {
  status: number;
  data: unknown;
}

export interface RecordedRequest {
  url: string;
  params: unknown;
  token: string | null;
}

export const NOT_FOUND: StubReply = {
  status: 404,
  data: { status: { message: 'Data not found', status_code: 404 } },
};

/**
 * In-process axios adapter: answers from a table of full URLs and records
 * every request. Unknown URLs get a Riot-style 404 body.
 */
export function stubAdapter(routes: Record<string, StubReply>): {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const path = config.url ?? '';
    const url = /^https?:\/\//.test(path) ? path : `${config.baseURL ?? ''}${path}`;
    const token = config.headers.get('X-Riot-Token');
    requests.push({ url, params: config.params, token: typeof token === 'string' ? token : null });

    const reply = routes[url] ?? NOT_FOUND;
    const response: AxiosResponse = { data: reply.data, status: reply.status, statusText: '', headers: {}, config };
    return response;
  };
  return { adapter, requests };
}

export function ok(data: unknown): StubReply {
  return { status: 200, data };
}
