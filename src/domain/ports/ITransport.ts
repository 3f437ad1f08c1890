/**
 * Form parameters of an outbound API request
 */
export type RequestParams = Record<string, string>;

export interface TransportResponse {
  status: number;
  /** Parsed JSON body */
  body: unknown;
}

/**
 * Transport that resolves requests asynchronously (HTTP)
 */
export interface IAsyncTransport {
  post(url: string, params?: RequestParams): Promise<TransportResponse>;
}

/**
 * Transport that completes requests before returning (recorded fixtures, tests)
 */
export interface ISyncTransport {
  post(url: string, params?: RequestParams): TransportResponse;
}
