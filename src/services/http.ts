import axios, { type AxiosRequestConfig } from 'axios';
import { HTTP_TIMEOUT_MS } from '../config';

const http = axios.create({
    timeout: HTTP_TIMEOUT_MS
});

export const formatAxiosError = (error: unknown, context: string) => {
    if (!axios.isAxiosError(error)) {
        return error instanceof Error ? `${context}: ${error.message}` : `${context}: Unexpected error.`;
    }
    const status = error.response?.status;
    const statusText = error.response?.statusText ?? 'Unknown error';
    return `${context}: ${status ? `${status} ${statusText}` : 'Network/timeout error'}.`;
};

/** GET a JSON document. Failures reach the caller as they are; nothing retries. */
export async function getJson<T = unknown>(url: string, config: AxiosRequestConfig = {}): Promise<T> {
    const response = await http.get<T>(url, { responseType: 'json', ...config });
    return response.data;
}
