import axios, { AxiosInstance, AxiosError } from 'axios';
import type { HttpToolServiceOptions, InvokeResponse, ListToolsResponse, ToolDescriptor, ToolService } from './types';
import { ToolServiceError, ToolAuthenticationError, ToolRateLimitError, ToolNotFoundError, ToolInvocationError } from './errors';
import { RateLimiter } from './rate-limiter';

/** Set on a request once it has been retried after a 429 */
export const RETRY_HEADER = 'x-stepwise-retry';

/**
 * HTTP client for a tool-execution gateway.
 *
 *   GET  /tools               -> { tools: ToolDescriptor[] }
 *   POST /tools/:name/invoke  -> { result } | { error }
 */
export class HttpToolService implements ToolService {
  private axiosInstance: AxiosInstance;
  private logEnabled: boolean;

  constructor(options: HttpToolServiceOptions) {
    this.logEnabled = options.logRequests ?? false;
    this.axiosInstance = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeout || 30000,
      headers: {
        ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
        Accept: 'application/json',
        'User-Agent': 'stepwise-agent',
      },
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    if (this.logEnabled) {
      this.axiosInstance.interceptors.request.use((config) => {
        console.log(`[tools] ${config.method?.toUpperCase()} ${config.url}`);
        return config;
      });
    }

    this.axiosInstance.interceptors.response.use(
      (response) => response,
      async (error: AxiosError<InvokeResponse>) => {
        const response = error.response;
        if (!response) throw new ToolServiceError(`Network Error: ${error.message}`, 0, error);

        // One retry after Retry-After on 429
        const waitTime = RateLimiter.getWaitTime(response);
        if (response.status === 429) {
          const config = error.config;
          if (config?.headers && waitTime !== null && config.headers[RETRY_HEADER] === undefined) {
            config.headers[RETRY_HEADER] = '1';
            console.warn(`Tool service rate limit hit. Retrying after ${waitTime}ms...`);
            await RateLimiter.sleep(waitTime);
            return this.axiosInstance.request(config);
          }
          throw new ToolRateLimitError(waitTime);
        }

        const toolName = toolNameFromUrl(error.config?.url);
        const bodyError = typeof response.data?.error === 'string' ? response.data.error : undefined;

        switch (response.status) {
          case 401:
          case 403:
            throw new ToolAuthenticationError();
          case 404:
            throw new ToolNotFoundError(toolName ?? 'resource');
          case 400:
          case 422:
            throw new ToolInvocationError(toolName ?? 'unknown', bodyError ?? response.statusText, response.status);
          default:
            throw new ToolServiceError(bodyError ?? (response.statusText || `HTTP ${response.status}`), response.status, error);
        }
      },
    );
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const { data } = await this.axiosInstance.get<ListToolsResponse>('/tools');
    return (data.tools ?? [])
      .filter((t): t is Partial<ToolDescriptor> & { name: string } => typeof t.name === 'string' && t.name.length > 0)
      .map((t) => ({
        name: t.name,
        description: t.description ?? '',
        parameters: t.parameters ?? {},
      }));
  }

  async invoke(name: string, args: Record<string, unknown>): Promise<string> {
    const { data } = await this.axiosInstance.post<InvokeResponse>(`/tools/${encodeURIComponent(name)}/invoke`, { arguments: args });

    if (typeof data.error === 'string' && data.error.length > 0) {
      throw new ToolInvocationError(name, data.error);
    }
    if (data.result === undefined || data.result === null) {
      return '';
    }
    return typeof data.result === 'string' ? data.result : JSON.stringify(data.result);
  }
}

function toolNameFromUrl(url: string | undefined): string | undefined {
  const match = url ? /\/tools\/([^/]+)\/invoke/.exec(url) : null;
  return match?.[1] ? decodeURIComponent(match[1]) : undefined;
}
