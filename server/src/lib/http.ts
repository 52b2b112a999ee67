import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { externalApiError } from './errors';

const toNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const REQUEST_TIMEOUT_MS = toNumber(process.env['REQUEST_TIMEOUT_MS'], 7000);

// No retry interceptor: fallback across providers happens in the provider chain.
export function createHttpClient(timeoutMs: number = REQUEST_TIMEOUT_MS): AxiosInstance {
  return axios.create({
    timeout: timeoutMs,
    headers: { Accept: 'application/json' },
  });
}

export const http = createHttpClient();

export function joinUrl(base: string, path: string) {
  const trimmedBase = base.replace(/\/+$/, '');
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return `${trimmedBase}${normalizedPath}`;
}

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

export type UpstreamResponse = { status: number; data: unknown };

/**
 * GET that resolves for every HTTP status; only transport failures
 * (DNS, refused connection, timeout, abort) reject, as external_api errors.
 */
export async function getUpstream(
  client: AxiosInstance,
  label: string,
  url: string,
  params: Record<string, string>,
  signal?: AbortSignal
): Promise<UpstreamResponse> {
  try {
    const response = await client.get<unknown>(url, {
      params,
      validateStatus: () => true,
      ...(signal ? { signal } : {}),
    });
    return { status: response.status, data: response.data };
  } catch (error) {
    throw externalApiError(`failed to call ${label}`, error);
  }
}
