import axios, { AxiosInstance } from 'axios';

export type GetRequestParams = Record<string, string>;

export type GetRequestResult =
  | { ok: true; status: number }
  | { ok: false; status: number; body: string }
  | { ok: false; status: null; timedOut: boolean; message: string };

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Issues a single GET and reports the outcome instead of throwing. Only a
 * 200 counts as accepted.
 */
export async function sendGetRequest(
  http: AxiosInstance,
  url: string,
  params: GetRequestParams,
  timeoutMs: number,
): Promise<GetRequestResult> {
  try {
    const response = await http.get<unknown>(url, {
      params,
      timeout: timeoutMs,
      responseType: 'text',
      validateStatus: () => true,
    });
    if (response.status === 200) {
      return { ok: true, status: response.status };
    }
    return {
      ok: false,
      status: response.status,
      body: stringifyBody(response.data),
    };
  } catch (error) {
    if (axios.isAxiosError(error)) {
      return {
        ok: false,
        status: null,
        timedOut: TIMEOUT_CODES.has(error.code ?? ''),
        message: error.message,
      };
    }
    return {
      ok: false,
      status: null,
      timedOut: false,
      message: error instanceof Error ? error.message : String(error),
    };
  }
}

function stringifyBody(data: unknown): string {
  if (typeof data === 'string') return data.slice(0, 500);
  if (data === undefined || data === null) return '';
  try {
    return JSON.stringify(data).slice(0, 500);
  } catch {
    return String(data);
  }
}
