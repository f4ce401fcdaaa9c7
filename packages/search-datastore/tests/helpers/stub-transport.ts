/**
 * @file In-process transport for the official client.
 *
 * A `Connection` class the client's transport calls instead of opening a
 * socket. Requests go to a handler that answers with a status and a JSON
 * body, or throws a transport error. Everything above the socket (status
 * handling, `ignore`, error classes, response parsing) is the client's own.
 */

import {
  BaseConnection,
  type ClientOptions,
  type ConnectionRequestOptions,
  type ConnectionRequestOptionsAsStream,
  type ConnectionRequestParams,
  type ConnectionRequestResponse,
  type ConnectionRequestResponseAsStream,
} from '@elastic/elasticsearch'

export interface StubRequest {
  method: string
  path: string
  querystring: string
  body: unknown
}

export interface StubResponse {
  /** @default 200 */
  statusCode?: number
  body?: unknown
}

export type StubHandler = (request: StubRequest) => StubResponse

const RESPONSE_HEADERS = {
  'content-type': 'application/json;charset=utf-8',
  'x-elastic-product': 'Elasticsearch',
}

function parseBody(body: ConnectionRequestParams['body']): unknown {
  if (typeof body === 'string') {
    return body.length > 0 ? JSON.parse(body) : undefined
  }
  if (Buffer.isBuffer(body)) {
    return JSON.parse(body.toString('utf8'))
  }
  return undefined
}

/**
 * Client options routing every request to `handler`. Requests are also
 * recorded in `requests`.
 */
export function createStubTransport(handler: StubHandler) {
  const requests: StubRequest[] = []

  class StubConnection extends BaseConnection {
    override request(
      params: ConnectionRequestParams,
      options: ConnectionRequestOptions
    ): Promise<ConnectionRequestResponse>
    override request(
      params: ConnectionRequestParams,
      options: ConnectionRequestOptionsAsStream
    ): Promise<ConnectionRequestResponseAsStream>
    override async request(
      params: ConnectionRequestParams,
      _options: ConnectionRequestOptions | ConnectionRequestOptionsAsStream
    ): Promise<ConnectionRequestResponse | ConnectionRequestResponseAsStream> {
      const request: StubRequest = {
        method: params.method,
        path: params.path,
        querystring: params.querystring ?? '',
        body: parseBody(params.body),
      }
      requests.push(request)

      const response = handler(request)
      return {
        statusCode: response.statusCode ?? 200,
        headers: RESPONSE_HEADERS,
        body: response.body === undefined ? '' : JSON.stringify(response.body),
      }
    }
  }

  const clientOptions: ClientOptions = { Connection: StubConnection }
  return { clientOptions, requests }
}
