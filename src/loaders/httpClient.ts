import axios, { type AxiosRequestConfig, type AxiosResponse } from "axios";

const TIMEOUT = 10_000;
const HEADERS = {
  Accept: "text/csv, text/plain;q=0.9, */*;q=0.8",
};

// --- Retry with exponential backoff ---

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 500;

function isRetryable(err: unknown): boolean {
  if (!axios.isAxiosError(err)) return false;
  const status = err.response?.status;
  // no response = network error or timeout
  return status === undefined || status >= 500 || status === 429;
}

export async function fetchWithRetry<T = string>(
  url: string,
  config?: AxiosRequestConfig,
): Promise<AxiosResponse<T>> {
  const mergedConfig: AxiosRequestConfig = {
    timeout: TIMEOUT,
    responseType: "text",
    ...config,
    headers: { ...HEADERS, ...config?.headers },
  };

  let lastError: unknown;
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await axios.get<T>(url, mergedConfig);
    } catch (err) {
      lastError = err;
      if (attempt === MAX_RETRIES || !isRetryable(err)) break;
      const delay = BASE_DELAY_MS * 2 ** attempt;
      await new Promise((r) => setTimeout(r, delay));
    }
  }
  throw lastError;
}
