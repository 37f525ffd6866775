import { Dispatcher } from "./dispatcher";
import { HttpHeaders, HttpMethod } from "./http";

export interface TestRequestOptions {
  queryString?: string;
  headers?: HttpHeaders;
  data?: string;
}

export interface TestResponse {
  status: string;
  statusCode: number;
  /** Header names as sent; a repeated name keeps its last value. */
  headers: Record<string, string>;
  headerPairs: [string, string][];
  data: string;
  body: Buffer;
}

/**
 * Calls a dispatcher directly, without a socket, the way a host would.
 */
export class TestClient {
  constructor(private readonly app: Dispatcher) {}

  get(path: string, options?: TestRequestOptions): Promise<TestResponse> {
    return this.request("GET", path, options);
  }

  post(path: string, options?: TestRequestOptions): Promise<TestResponse> {
    return this.request("POST", path, options);
  }

  async request(
    method: HttpMethod,
    path: string,
    { queryString = "", headers = {}, data }: TestRequestOptions = {}
  ): Promise<TestResponse> {
    const response = await this.app.handle({
      method,
      path,
      queryString,
      headers,
      body: data,
    });
    return {
      status: response.status,
      statusCode: response.statusCode,
      headers: Object.fromEntries(response.headers),
      headerPairs: response.headers.map(
        ([name, value]): [string, string] => [name, value]
      ),
      data: response.text(),
      body: response.body,
    };
  }
}
