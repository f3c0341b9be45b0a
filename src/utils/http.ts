import type { AxiosRequestConfig } from "axios";

/**
 * The slice of an axios instance the API clients use. Response bodies are
 * `unknown` until validated.
 */
export interface HttpClient {
    get(url: string, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
    post(
        url: string,
        data?: unknown,
        config?: AxiosRequestConfig
    ): Promise<{ data: unknown }>;
}
